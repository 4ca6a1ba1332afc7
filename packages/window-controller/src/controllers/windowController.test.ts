import { describe, expect, it, vi } from 'vitest';

import { parseWindowConfig, type WindowConfigInput } from '@termshell/shared';

import {
  FakeSurface,
  FakeSurfaceTreeFactory,
  FakeToolkit,
  createTestLogger,
} from '../test/fakes';
import type { Tab } from './tab';
import type { AboutInfo } from './toolkit';
import {
  CONFIG_RELOADED_MESSAGE,
  TabCreationError,
  WindowController,
  WindowCreationError,
} from './windowController';

const ABOUT: AboutInfo = {
  name: 'termshell',
  version: '1.2.3',
  website: 'https://example.com/termshell',
};

function setup(configInput: WindowConfigInput = {}) {
  const toolkit = new FakeToolkit();
  const surfaceTrees = new FakeSurfaceTreeFactory();
  const logger = createTestLogger();
  const onDestroyed = vi.fn();
  const window = new WindowController({
    id: 'window-1',
    config: parseWindowConfig(configInput),
    toolkit,
    surfaceTrees,
    about: ABOUT,
    logger,
    onDestroyed,
  });
  const native = toolkit.windowFor(window.id);
  return { window, toolkit, surfaceTrees, logger, onDestroyed, native };
}

function tabAt(window: WindowController, index: number): Tab {
  const tab = window.tabs.at(index);
  if (!tab) {
    throw new Error(`Expected tab at index ${index}`);
  }
  return tab;
}

describe('WindowController', () => {
  describe('creation', () => {
    it('starts with an empty tab collection and hands the chrome to the toolkit', () => {
      const { window, native } = setup();

      expect(window.hasTabs()).toBe(false);
      expect(window.tabs.currentIndex).toBeNull();
      expect(native.spec).toEqual({
        windowId: 'window-1',
        title: 'Terminal',
        defaultSize: { width: 1000, height: 600 },
        fullscreen: false,
        decorated: true,
        titleBarVisible: true,
        chrome: {
          hasTitleBar: true,
          enhancedChrome: true,
          supportsToasts: true,
          supportsTabOverview: true,
          tabBarPlacement: 'top',
          wideTabs: true,
          toolbarStyle: 'raised',
        },
      });
    });

    it('applies initial fullscreen and hides the title bar of an undecorated window', () => {
      const { window, native } = setup({ fullscreen: true, decorated: false });

      expect(window.isFullscreen()).toBe(true);
      expect(window.isDecorated()).toBe(false);
      expect(window.hasTitleBar()).toBe(true);
      expect(window.isTitleBarVisible()).toBe(false);
      expect(native.spec.fullscreen).toBe(true);
      expect(native.spec.titleBarVisible).toBe(false);
    });

    it('wraps toolkit failures in a WindowCreationError', () => {
      const toolkit = new FakeToolkit();
      toolkit.failNext = new Error('display unavailable');

      let caught: unknown;
      try {
        new WindowController({
          id: 'window-2',
          config: parseWindowConfig({}),
          toolkit,
          surfaceTrees: new FakeSurfaceTreeFactory(),
          about: ABOUT,
          logger: createTestLogger(),
        });
      } catch (err) {
        caught = err;
      }

      expect(caught).toBeInstanceOf(WindowCreationError);
      if (!(caught instanceof WindowCreationError)) {
        throw new Error('Expected WindowCreationError');
      }
      expect(caught.code).toBe('toolkit_failed');
      expect(caught.message).toBe('Failed to create window window-2: display unavailable');
      expect(toolkit.windows).toHaveLength(0);
    });
  });

  describe('tabs', () => {
    it('appends a new tab, selects it and focuses its surface', () => {
      const { window, surfaceTrees } = setup();
      window.newTab();
      const parent = surfaceTrees.surfaceAt(0);

      const tab = window.newTab(parent);

      expect(window.tabs.count).toBe(2);
      expect(window.tabs.currentIndex).toBe(1);
      expect(window.getCurrentTab()).toBe(tab);
      expect(tab.windowId).toBe('window-1');
      expect(surfaceTrees.treeAt(1).parent).toBe(parent);
      expect(surfaceTrees.surfaceAt(1).focus).toHaveBeenCalledTimes(1);
    });

    it('selects the tab that shifted into place when the current tab closes', () => {
      const { window, surfaceTrees } = setup();
      window.newTab();
      window.newTab();
      window.newTab();
      window.gotoTab(2);
      const formerThird = tabAt(window, 2);

      window.closeTab(tabAt(window, 1));

      expect(window.tabs.count).toBe(2);
      expect(window.tabs.currentIndex).toBe(1);
      expect(window.getCurrentTab()).toBe(formerThird);
      expect(surfaceTrees.treeAt(1).destroy).toHaveBeenCalledTimes(1);
      expect(window.isDestroyed()).toBe(false);
    });

    it('closes the window when its last tab closes', () => {
      const { window, native, onDestroyed, surfaceTrees } = setup();
      const tab = window.newTab();

      window.closeTab(tab);

      expect(window.tabs.isEmpty()).toBe(true);
      expect(window.tabs.currentIndex).toBeNull();
      expect(window.isDestroyed()).toBe(true);
      expect(native.destroy).toHaveBeenCalledTimes(1);
      expect(onDestroyed).toHaveBeenCalledWith(window);
      expect(surfaceTrees.treeAt(0).destroy).toHaveBeenCalledTimes(1);
    });

    it('closes a tab once its surface tree becomes empty', () => {
      const { window, surfaceTrees } = setup();
      window.newTab();
      window.newTab();

      surfaceTrees.treeAt(0).closeSurface(surfaceTrees.surfaceAt(0));

      expect(window.tabs.count).toBe(1);
      expect(window.getCurrentTab()?.focusedSurface).toBe(surfaceTrees.surfaceAt(1));
    });

    it('leaves the collection untouched when the surface tree cannot be created', () => {
      const { window, surfaceTrees } = setup();
      window.newTab();
      surfaceTrees.failNext = new Error('pty exhausted');

      expect(() => window.newTab()).toThrow(TabCreationError);
      expect(window.tabs.count).toBe(1);
      expect(window.tabs.currentIndex).toBe(0);
    });

    it('refuses a surface tree that is already empty', () => {
      const { window, surfaceTrees } = setup();
      window.newTab();
      surfaceTrees.emptyNext = true;

      let caught: unknown;
      try {
        window.newTab();
      } catch (err) {
        caught = err;
      }
      if (!(caught instanceof TabCreationError)) {
        throw new Error('Expected TabCreationError');
      }
      expect(caught.code).toBe('surface_tree_empty');
      expect(window.tabs.count).toBe(1);
      expect(window.tabs.currentIndex).toBe(0);
      expect(surfaceTrees.treeAt(1).destroy).toHaveBeenCalledTimes(1);
      expect(window.isDestroyed()).toBe(false);
    });

    it('exposes tabs through a view that cannot change them', () => {
      const { window } = setup();
      const tab = window.newTab();

      expect('remove' in window.tabs).toBe(false);
      expect('append' in window.tabs).toBe(false);
      expect('clear' in window.tabs).toBe(false);
      expect(window.tabs.toArray()).toEqual([tab]);

      window.closeTab(tab);

      expect(window.tabs.count).toBe(0);
      expect(window.isDestroyed()).toBe(true);
    });

    it('refuses new tabs after the window is destroyed', () => {
      const { window } = setup();
      window.destroy();

      let caught: unknown;
      try {
        window.newTab();
      } catch (err) {
        caught = err;
      }
      expect(caught).toBeInstanceOf(TabCreationError);
      if (!(caught instanceof TabCreationError)) {
        throw new Error('Expected TabCreationError');
      }
      expect(caught.code).toBe('window_destroyed');
    });

    it('logs and ignores tabs that belong elsewhere', () => {
      const { window, logger } = setup();
      window.newTab();
      const other = setup().window.newTab();

      window.closeTab(other);

      expect(window.tabs.count).toBe(1);
      expect(logger.info).toHaveBeenCalledWith(
        `[window] window-1 closeTab: tab ${other.id} is not in this window`,
      );
    });
  });

  describe('navigation', () => {
    it('moves relative to the tab holding the given surface and refocuses', () => {
      const { window, surfaceTrees } = setup();
      window.newTab();
      window.newTab();
      window.newTab();
      const first = surfaceTrees.surfaceAt(0);
      const second = surfaceTrees.surfaceAt(1);

      window.gotoNextTab(first);

      expect(window.tabs.currentIndex).toBe(1);
      expect(second.focus).toHaveBeenCalledTimes(2);

      window.gotoPreviousTab(second);
      expect(window.tabs.currentIndex).toBe(0);
    });

    it('does not wrap at either end', () => {
      const { window, surfaceTrees } = setup();
      window.newTab();
      window.newTab();

      window.gotoNextTab(surfaceTrees.surfaceAt(1));
      window.gotoNextTab(surfaceTrees.surfaceAt(1));
      expect(window.tabs.currentIndex).toBe(1);

      window.gotoTab(1);
      window.gotoPreviousTab(surfaceTrees.surfaceAt(0));
      expect(window.tabs.currentIndex).toBe(0);
    });

    it('logs and ignores surfaces that are not in a tab', () => {
      const { window, logger } = setup();
      window.newTab();

      window.gotoNextTab(new FakeSurface('detached'));

      expect(window.tabs.currentIndex).toBe(0);
      expect(logger.info).toHaveBeenCalledWith(
        '[window] surface is not attached to a tab bar, cannot navigate',
      );
    });

    it('goes to numbered and last tabs', () => {
      const { window } = setup();
      window.newTab();
      window.newTab();
      window.newTab();

      window.gotoTab(0);
      expect(window.tabs.currentIndex).toBe(2);

      window.gotoTab(1);
      expect(window.tabs.currentIndex).toBe(0);

      window.gotoTab(9);
      expect(window.tabs.currentIndex).toBe(0);

      window.gotoLastTab();
      expect(window.tabs.currentIndex).toBe(2);
    });

    it('focuses nothing when there is no current tab', () => {
      const { window } = setup();
      expect(() => window.focusCurrentTab()).not.toThrow();
    });
  });

  describe('window state', () => {
    it('ties title-bar visibility to decorations', () => {
      const { window, native } = setup();

      window.toggleDecorations();

      expect(window.isDecorated()).toBe(false);
      expect(window.isTitleBarVisible()).toBe(false);
      expect(native.setDecorated).toHaveBeenLastCalledWith(false);
      expect(native.setTitleBarVisible).toHaveBeenLastCalledWith(false);

      window.toggleDecorations();

      expect(window.isDecorated()).toBe(true);
      expect(window.isTitleBarVisible()).toBe(true);
      expect(native.setTitleBarVisible).toHaveBeenLastCalledWith(true);
    });

    it('only toggles decorations when there is no title bar', () => {
      const { window, native } = setup({ titleBar: false });

      window.toggleDecorations();

      expect(window.isDecorated()).toBe(false);
      expect(window.hasTitleBar()).toBe(false);
      expect(native.setDecorated).toHaveBeenCalledWith(false);
      expect(native.setTitleBarVisible).not.toHaveBeenCalled();
    });

    it('flips fullscreen', () => {
      const { window, native } = setup();

      window.toggleFullscreen();
      expect(window.isFullscreen()).toBe(true);
      expect(native.setFullscreen).toHaveBeenLastCalledWith(true);

      window.toggleFullscreen();
      expect(window.isFullscreen()).toBe(false);
      expect(native.setFullscreen).toHaveBeenLastCalledWith(false);
    });

    it('updates the title', () => {
      const { window, native } = setup();

      window.setTitle('vim notes.md');
      window.setTitle('vim notes.md');

      expect(window.getTitle()).toBe('vim notes.md');
      expect(native.setTitle).toHaveBeenCalledTimes(1);
    });

    it('announces a configuration reload', () => {
      const { window, native } = setup();

      window.onConfigReloaded();

      expect(native.showToast).toHaveBeenCalledWith({
        title: CONFIG_RELOADED_MESSAGE,
        timeoutSeconds: 3,
      });
    });

    it('skips toasts when the chrome has no toast support', () => {
      const { window, native } = setup({ enhancedChrome: false });

      window.onConfigReloaded();

      expect(native.showToast).not.toHaveBeenCalled();
    });
  });

  describe('actions', () => {
    it('drops actions when no tab is open', () => {
      const { window } = setup();
      expect(window.dispatchAction('reset')).toEqual({ status: 'no_surface', actionId: 'reset' });
    });

    it('sends actions to the focused surface of the current tab', () => {
      const { window, surfaceTrees } = setup();
      window.newTab();
      window.newTab();

      const result = window.dispatchAction('split_right');

      expect(result.status).toBe('dispatched');
      expect(surfaceTrees.surfaceAt(1).performBindingAction).toHaveBeenCalledWith({
        type: 'new_split',
        direction: 'right',
      });
      expect(surfaceTrees.surfaceAt(0).performBindingAction).not.toHaveBeenCalled();
    });

    it('shows a toast after copying when the chrome supports it', () => {
      const { window, native } = setup();
      window.newTab();

      window.dispatchAction('copy_to_clipboard');

      expect(native.showToast).toHaveBeenCalledWith({
        title: 'Copied to clipboard',
        timeoutSeconds: 3,
      });
    });

    it('copies silently without toast support', () => {
      const { window, native, surfaceTrees } = setup({ titleBar: false });
      window.newTab();

      window.dispatchAction('copy_to_clipboard');

      expect(surfaceTrees.surfaceAt(0).performBindingAction).toHaveBeenCalledWith({
        type: 'copy_to_clipboard',
      });
      expect(native.showToast).not.toHaveBeenCalled();
    });
  });

  describe('toolkit events', () => {
    it('routes invoked actions and the about action', () => {
      const { window, native, surfaceTrees } = setup();
      window.newTab();

      native.events.emit({ type: 'action_invoked', windowId: 'window-1', actionId: 'paste_from_clipboard' });
      native.events.emit({ type: 'action_invoked', windowId: 'window-1', actionId: 'about' });

      expect(surfaceTrees.surfaceAt(0).performBindingAction).toHaveBeenCalledWith({
        type: 'paste_from_clipboard',
      });
      expect(native.showAboutDialog).toHaveBeenCalledWith(ABOUT);
    });

    it('drops unknown actions with a warning', () => {
      const { window, native, logger, surfaceTrees } = setup();
      window.newTab();

      native.events.emit({ type: 'action_invoked', windowId: 'window-1', actionId: 'self_destruct' });

      expect(surfaceTrees.surfaceAt(0).performBindingAction).not.toHaveBeenCalled();
      expect(logger.warn).toHaveBeenCalledWith('[window] window-1 unknown action: self_destruct');
    });

    it('asks the focused surface for a new tab when the new-tab button is clicked', () => {
      const { window, native, surfaceTrees } = setup();
      window.newTab();

      native.events.emit({ type: 'new_tab_clicked', windowId: 'window-1' });

      expect(surfaceTrees.surfaceAt(0).performBindingAction).toHaveBeenCalledWith({ type: 'new_tab' });
      expect(window.tabs.count).toBe(1);
    });

    it('creates a tab parented on the focused surface from the tab overview', () => {
      const { window, native, surfaceTrees } = setup();
      window.newTab();

      native.events.emit({ type: 'tab_overview_create', windowId: 'window-1' });

      expect(window.tabs.count).toBe(2);
      expect(window.tabs.currentIndex).toBe(1);
      expect(surfaceTrees.treeAt(1).parent).toBe(surfaceTrees.surfaceAt(0));
    });

    it('logs a failed tab creation from the tab overview', () => {
      const { window, native, surfaceTrees, logger } = setup();
      window.newTab();
      surfaceTrees.failNext = new Error('pty exhausted');

      native.events.emit({ type: 'tab_overview_create', windowId: 'window-1' });

      expect(window.tabs.count).toBe(1);
      expect(logger.error).toHaveBeenCalledWith(
        '[window] window-1 failed to create tab from overview: Failed to create tab in window window-1: pty exhausted',
      );
    });

    it('refocuses the terminal when the context menu closes', () => {
      const { window, native, surfaceTrees } = setup();
      window.newTab();
      const surface = surfaceTrees.surfaceAt(0);
      surface.focus.mockClear();

      native.events.emit({ type: 'context_menu_closed', windowId: 'window-1' });

      expect(surface.focus).toHaveBeenCalledTimes(1);
    });

    it('ignores events addressed to another window', () => {
      const { window, native, logger } = setup();

      window.handleEvent({ type: 'close_request', windowId: 'window-9' });

      expect(window.isDestroyed()).toBe(false);
      expect(native.destroy).not.toHaveBeenCalled();
      expect(logger.warn).toHaveBeenCalledWith(
        '[window] window-1 ignoring close_request addressed to window-9',
      );
    });
  });

  describe('closing', () => {
    it('closes without a prompt when no surface needs confirmation', () => {
      const { window, native, onDestroyed } = setup();
      window.newTab();
      window.newTab();

      native.events.emit({ type: 'close_request', windowId: 'window-1' });

      expect(native.prompts).toHaveLength(0);
      expect(window.isDestroyed()).toBe(true);
      expect(window.getCloseState()).toBe('closing');
      expect(native.destroy).toHaveBeenCalledTimes(1);
      expect(onDestroyed).toHaveBeenCalledTimes(1);
    });

    it('leaves everything as it was when the user declines', () => {
      const { window, native, surfaceTrees } = setup();
      window.newTab();
      window.newTab();
      window.newTab();
      window.gotoTab(2);
      surfaceTrees.surfaceAt(2).confirmQuit = true;
      const tabsBefore = window.tabs.toArray();
      const snapshotBefore = window.getSnapshot();

      expect(window.requestClose()).toBe('prompted');
      native.lastPrompt().options.onCancel();

      expect(window.tabs.toArray()).toEqual(tabsBefore);
      expect(window.getSnapshot()).toEqual(snapshotBefore);
      for (const tree of surfaceTrees.trees) {
        expect(tree.destroy).not.toHaveBeenCalled();
      }
      expect(native.destroy).not.toHaveBeenCalled();
    });

    it('destroys the window and every tab when the user confirms', () => {
      const { window, native, surfaceTrees, onDestroyed } = setup();
      window.newTab();
      window.newTab();
      surfaceTrees.surfaceAt(0).confirmQuit = true;

      window.requestClose();
      native.lastPrompt().options.onConfirm();

      expect(window.isDestroyed()).toBe(true);
      expect(window.tabs.isEmpty()).toBe(true);
      for (const tree of surfaceTrees.trees) {
        expect(tree.destroy).toHaveBeenCalledTimes(1);
      }
      expect(native.destroy).toHaveBeenCalledTimes(1);
      expect(onDestroyed).toHaveBeenCalledTimes(1);
    });

    it('invalidates a pending prompt when the toolkit destroys the window', () => {
      const { window, native, onDestroyed } = setup();
      window.newTab();
      const surface = window.getCurrentTab()?.focusedSurface;
      if (!(surface instanceof FakeSurface)) {
        throw new Error('Expected fake surface');
      }
      surface.confirmQuit = true;
      window.requestClose();
      const prompt = native.lastPrompt();

      native.events.emit({ type: 'destroy', windowId: 'window-1' });

      expect(prompt.close).toHaveBeenCalledTimes(1);
      expect(window.isDestroyed()).toBe(true);
      expect(window.getCloseState()).toBe('cancelled');
      expect(native.destroy).not.toHaveBeenCalled();
      expect(onDestroyed).toHaveBeenCalledTimes(1);

      prompt.options.onConfirm();
      expect(native.destroy).not.toHaveBeenCalled();
      expect(onDestroyed).toHaveBeenCalledTimes(1);
    });

    it('stops listening to toolkit events once destroyed', () => {
      const { window, native } = setup();
      window.destroy();

      expect(native.events.listenerCount()).toBe(0);
      expect(window.dispatchAction('new_window')).toEqual({
        status: 'no_surface',
        actionId: 'new_window',
      });
    });
  });
});
