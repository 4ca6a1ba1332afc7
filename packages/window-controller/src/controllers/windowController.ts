import { randomUUID } from 'node:crypto';

import {
  parseWindowActionId,
  type BindingActionId,
  type WindowConfig,
} from '@termshell/shared';

import { describeError, type Logger } from '../utils/logger';
import { resolveWindowChrome, type WindowChrome } from '../utils/windowChrome';
import { ActionDispatcher, type DispatchResult } from './actionDispatcher';
import {
  CloseConfirmationController,
  type CloseConfirmationState,
  type CloseRequestOutcome,
} from './closeConfirmationController';
import { Tab } from './tab';
import { TabCollection, type ReadonlyTabCollection } from './tabCollection';
import type { SurfaceTree, SurfaceTreeFactory, TerminalSurface } from './terminalEngine';
import type { AboutInfo, NativeWindow, ToolkitAdapter } from './toolkit';
import { WindowEventBus, type WindowEvent } from './windowEventBus';

export const TOAST_TIMEOUT_SECONDS = 3;
export const CONFIG_RELOADED_MESSAGE = 'Reloaded the configuration';

export class WindowCreationError extends Error {
  code: 'toolkit_failed';

  constructor(code: 'toolkit_failed', message: string) {
    super(message);
    this.code = code;
  }
}

export type TabCreationErrorCode =
  | 'window_destroyed'
  | 'surface_tree_failed'
  | 'surface_tree_empty';

export class TabCreationError extends Error {
  code: TabCreationErrorCode;

  constructor(code: TabCreationErrorCode, message: string) {
    super(message);
    this.code = code;
  }
}

export interface WindowControllerOptions {
  config: WindowConfig;
  toolkit: ToolkitAdapter;
  surfaceTrees: SurfaceTreeFactory;
  about: AboutInfo;
  dispatcher?: ActionDispatcher;
  logger?: Logger;
  id?: string;
  /** Runs once after the window has been torn down, whichever path closed it. */
  onDestroyed?: (window: WindowController) => void;
}

export interface WindowSnapshot {
  id: string;
  title: string;
  fullscreen: boolean;
  decorated: boolean;
  hasTitleBar: boolean;
  titleBarVisible: boolean;
  tabIds: string[];
  currentIndex: number | null;
  closeState: CloseConfirmationState;
  destroyed: boolean;
}

/**
 * One top-level terminal window.
 *
 * A window always owns a tab collection, even with no tabs. Toolkit events
 * arrive through the window's event bus and are translated into state changes
 * here; user actions are routed to the focused surface of the current tab.
 */
export class WindowController {
  readonly id: string;
  readonly chrome: WindowChrome;
  readonly tabs: ReadonlyTabCollection<Tab>;
  private readonly tabList = new TabCollection<Tab>();
  private title: string;
  private fullscreen: boolean;
  private decorated: boolean;
  private titleBarVisible: boolean;
  private destroyed = false;
  private readonly native: NativeWindow;
  private readonly events = new WindowEventBus();
  private readonly unsubscribeEvents: () => void;
  private readonly closeConfirmation: CloseConfirmationController;
  private readonly dispatcher: ActionDispatcher;
  private readonly logger: Logger;

  constructor(private readonly options: WindowControllerOptions) {
    const { config } = options;
    this.id = options.id ?? randomUUID();
    this.tabs = this.tabList.asReadonly();
    this.logger = options.logger ?? console;
    this.dispatcher = options.dispatcher ?? new ActionDispatcher({ logger: this.logger });
    this.chrome = resolveWindowChrome(config);
    this.title = config.title;
    this.fullscreen = config.fullscreen;
    this.decorated = config.decorated;
    // The title bar exists whenever configured; without decorations it stays hidden.
    this.titleBarVisible = this.chrome.hasTitleBar && this.decorated;

    try {
      this.native = options.toolkit.createWindow(
        {
          windowId: this.id,
          title: this.title,
          defaultSize: config.defaultSize,
          fullscreen: this.fullscreen,
          decorated: this.decorated,
          titleBarVisible: this.titleBarVisible,
          chrome: this.chrome,
        },
        this.events,
      );
    } catch (err) {
      this.events.clear();
      throw new WindowCreationError(
        'toolkit_failed',
        `Failed to create window ${this.id}: ${describeError(err)}`,
      );
    }

    this.closeConfirmation = new CloseConfirmationController({
      windowId: this.id,
      collectSurfaces: () => this.collectSurfaces(),
      showPrompt: (prompt) => this.native.showConfirmPrompt(prompt),
      close: () => {
        this.destroy();
      },
      logger: this.logger,
    });

    this.unsubscribeEvents = this.events.subscribe((event) => {
      this.handleEvent(event);
    });
  }

  getTitle(): string {
    return this.title;
  }

  isFullscreen(): boolean {
    return this.fullscreen;
  }

  isDecorated(): boolean {
    return this.decorated;
  }

  hasTitleBar(): boolean {
    return this.chrome.hasTitleBar;
  }

  isTitleBarVisible(): boolean {
    return this.titleBarVisible;
  }

  isDestroyed(): boolean {
    return this.destroyed;
  }

  hasTabs(): boolean {
    return !this.tabList.isEmpty();
  }

  getCurrentTab(): Tab | null {
    return this.tabList.getCurrent();
  }

  getCloseState(): CloseConfirmationState {
    return this.closeConfirmation.getState();
  }

  /**
   * True when any surface in this window wants confirmation before it is
   * closed. A surface whose check fails counts as wanting it.
   */
  needsConfirmQuit(): boolean {
    if (this.destroyed) {
      return false;
    }
    return this.closeConfirmation.needsConfirmation();
  }

  getSnapshot(): WindowSnapshot {
    return {
      id: this.id,
      title: this.title,
      fullscreen: this.fullscreen,
      decorated: this.decorated,
      hasTitleBar: this.chrome.hasTitleBar,
      titleBarVisible: this.titleBarVisible,
      tabIds: this.tabList.toArray().map((tab) => tab.id),
      currentIndex: this.tabList.currentIndex,
      closeState: this.closeConfirmation.getState(),
      destroyed: this.destroyed,
    };
  }

  setTitle(title: string): void {
    if (this.destroyed || title === this.title) {
      return;
    }
    this.title = title;
    this.native.setTitle(title);
  }

  /**
   * Adds a tab whose surfaces inherit from `parent` when given, appends it
   * and makes it current.
   */
  newTab(parent: TerminalSurface | null = null): Tab {
    if (this.destroyed) {
      throw new TabCreationError('window_destroyed', `Window ${this.id} has been destroyed`);
    }

    const tabId = randomUUID();
    let tree: SurfaceTree;
    try {
      tree = this.options.surfaceTrees.createSurfaceTree({
        parent,
        onEmpty: () => {
          this.handleTabEmptied(tabId);
        },
      });
    } catch (err) {
      throw new TabCreationError(
        'surface_tree_failed',
        `Failed to create tab in window ${this.id}: ${describeError(err)}`,
      );
    }

    // An engine may close the only surface before the tree is returned; onEmpty
    // then fires before the tab exists.
    if (tree.surfaces().length === 0) {
      tree.destroy();
      throw new TabCreationError(
        'surface_tree_empty',
        `Failed to create tab in window ${this.id}: surface tree has no surfaces`,
      );
    }

    const tab = new Tab({ id: tabId, windowId: this.id, tree });
    this.tabList.append(tab);
    this.focusCurrentTab();
    return tab;
  }

  /**
   * Removes `tab` and destroys its surfaces. Closing the last tab closes the
   * window.
   */
  closeTab(tab: Tab): void {
    if (this.destroyed) {
      return;
    }
    if (!this.tabList.remove(tab)) {
      this.logger.info(`[window] ${this.id} closeTab: tab ${tab.id} is not in this window`);
      return;
    }
    tab.destroy();

    if (!this.hasTabs()) {
      this.logger.debug?.(`[window] ${this.id} last tab closed`);
      this.destroy();
      return;
    }
    this.focusCurrentTab();
  }

  gotoPreviousTab(surface: TerminalSurface): void {
    const tab = this.findTabForSurface(surface);
    if (!tab) {
      this.logger.info('[window] surface is not attached to a tab bar, cannot navigate');
      return;
    }
    if (this.tabList.gotoPrevious(tab)) {
      this.focusCurrentTab();
    }
  }

  gotoNextTab(surface: TerminalSurface): void {
    const tab = this.findTabForSurface(surface);
    if (!tab) {
      this.logger.info('[window] surface is not attached to a tab bar, cannot navigate');
      return;
    }
    if (this.tabList.gotoNext(tab)) {
      this.focusCurrentTab();
    }
  }

  gotoLastTab(): void {
    if (this.tabList.gotoLast()) {
      this.focusCurrentTab();
    }
  }

  /**
   * Goes to the `n`th tab, counting from 1.
   */
  gotoTab(n: number): void {
    if (this.tabList.gotoNth(n)) {
      this.focusCurrentTab();
    }
  }

  toggleFullscreen(): void {
    if (this.destroyed) {
      return;
    }
    this.fullscreen = !this.fullscreen;
    this.native.setFullscreen(this.fullscreen);
  }

  toggleDecorations(): void {
    if (this.destroyed) {
      return;
    }
    this.decorated = !this.decorated;
    this.native.setDecorated(this.decorated);

    // Some toolkits keep the title bar when decorations go away; tie them together.
    if (this.chrome.hasTitleBar) {
      this.titleBarVisible = this.decorated;
      this.native.setTitleBarVisible(this.titleBarVisible);
    }
  }

  focusCurrentTab(): void {
    const surface = this.getActionSurface();
    if (!surface) {
      return;
    }
    surface.focus();
  }

  dispatchAction(actionId: BindingActionId): DispatchResult {
    const surface = this.destroyed ? null : this.getActionSurface();
    return this.dispatcher.dispatch(surface, actionId, {
      ...(this.chrome.supportsToasts
        ? {
            notify: (message: string) => {
              this.sendToast(message);
            },
          }
        : {}),
    });
  }

  /**
   * Entry point for toolkit close requests and the close keybinding.
   */
  requestClose(): CloseRequestOutcome {
    this.logger.debug?.(`[window] ${this.id} close request`);
    return this.closeConfirmation.requestClose();
  }

  showAbout(): void {
    if (this.destroyed) {
      return;
    }
    this.native.showAboutDialog(this.options.about);
  }

  onConfigReloaded(): void {
    this.sendToast(CONFIG_RELOADED_MESSAGE);
  }

  sendToast(title: string): void {
    if (this.destroyed || !this.chrome.supportsToasts) {
      return;
    }
    this.native.showToast({ title, timeoutSeconds: TOAST_TIMEOUT_SECONDS });
  }

  /**
   * Tears the window down. Any pending close prompt is invalidated first.
   * Safe to call more than once.
   */
  destroy(): void {
    this.teardown({ destroyNative: true });
  }

  handleEvent(event: WindowEvent): void {
    if (event.windowId !== this.id) {
      this.logger.warn(`[window] ${this.id} ignoring ${event.type} addressed to ${event.windowId}`);
      return;
    }
    if (this.destroyed) {
      this.logger.debug?.(`[window] ${this.id} ignoring ${event.type} after destroy`);
      return;
    }

    switch (event.type) {
      case 'close_request':
        this.requestClose();
        return;
      case 'destroy':
        this.logger.debug?.(`[window] ${this.id} destroyed by toolkit`);
        this.teardown({ destroyNative: false });
        return;
      case 'action_invoked':
        this.handleActionInvoked(event.actionId);
        return;
      case 'new_tab_clicked':
        this.dispatchAction('new_tab');
        return;
      case 'tab_overview_create':
        this.handleTabOverviewCreate();
        return;
      case 'context_menu_closed':
        this.focusCurrentTab();
        return;
    }
  }

  private handleActionInvoked(rawActionId: string): void {
    const actionId = parseWindowActionId(rawActionId);
    if (!actionId) {
      this.logger.warn(`[window] ${this.id} unknown action: ${rawActionId}`);
      return;
    }
    if (actionId === 'about') {
      this.showAbout();
      return;
    }
    this.dispatchAction(actionId);
  }

  private handleTabOverviewCreate(): void {
    if (!this.chrome.supportsTabOverview) {
      this.logger.warn(`[window] ${this.id} tab overview is not available`);
      return;
    }
    try {
      this.newTab(this.getActionSurface());
    } catch (err) {
      this.logger.error(
        `[window] ${this.id} failed to create tab from overview: ${describeError(err)}`,
      );
    }
  }

  private handleTabEmptied(tabId: string): void {
    const tab = this.tabList.findById(tabId);
    if (!tab) {
      return;
    }
    this.closeTab(tab);
  }

  private findTabForSurface(surface: TerminalSurface): Tab | null {
    return this.tabList.toArray().find((tab) => tab.containsSurface(surface)) ?? null;
  }

  private getActionSurface(): TerminalSurface | null {
    const tab = this.tabList.getCurrent();
    if (!tab) {
      return null;
    }
    return tab.focusedSurface;
  }

  private collectSurfaces(): TerminalSurface[] {
    return this.tabList.toArray().flatMap((tab) => tab.surfaces());
  }

  private teardown(options: { destroyNative: boolean }): void {
    if (this.destroyed) {
      return;
    }
    this.destroyed = true;
    this.closeConfirmation.cancel();
    this.unsubscribeEvents();

    for (const tab of this.tabList.clear()) {
      tab.destroy();
    }

    if (options.destroyNative) {
      try {
        this.native.destroy();
      } catch (err) {
        this.logger.error(`[window] ${this.id} failed to destroy native window: ${describeError(err)}`);
      }
    }
    this.events.clear();
    this.logger.debug?.(`[window] ${this.id} destroyed`);
    this.options.onDestroyed?.(this);
  }
}
