import type { WindowConfig } from '@termshell/shared';

import type { Logger } from '../utils/logger';
import { ActionDispatcher } from './actionDispatcher';
import type { SurfaceTreeFactory } from './terminalEngine';
import type { AboutInfo, ToolkitAdapter } from './toolkit';
import { WindowController } from './windowController';
import { WindowRegistry } from './windowRegistry';

export interface WindowManagerOptions {
  config: WindowConfig;
  toolkit: ToolkitAdapter;
  surfaceTrees: SurfaceTreeFactory;
  about: AboutInfo;
  registry?: WindowRegistry;
  logger?: Logger;
}

/**
 * Creates windows from the current configuration and keeps the registry of
 * open windows in step with their lifecycle.
 */
export class WindowManager {
  private config: WindowConfig;
  private readonly registry: WindowRegistry;
  private readonly dispatcher: ActionDispatcher;
  private readonly logger: Logger;

  constructor(private readonly options: WindowManagerOptions) {
    this.config = options.config;
    this.registry = options.registry ?? new WindowRegistry();
    this.logger = options.logger ?? console;
    this.dispatcher = new ActionDispatcher({ logger: this.logger });
  }

  getConfig(): WindowConfig {
    return this.config;
  }

  getRegistry(): WindowRegistry {
    return this.registry;
  }

  /**
   * Opens a window with no tabs. Throws `WindowCreationError` when the
   * toolkit cannot build it; nothing is registered in that case.
   */
  createWindow(): WindowController {
    const window = new WindowController({
      config: this.config,
      toolkit: this.options.toolkit,
      surfaceTrees: this.options.surfaceTrees,
      about: this.options.about,
      dispatcher: this.dispatcher,
      logger: this.logger,
      onDestroyed: (destroyed) => {
        this.registry.unregister(destroyed);
      },
    });
    this.registry.register(window);
    this.logger.debug?.(`[window-manager] created window ${window.id}`);
    return window;
  }

  getWindow(windowId: string): WindowController | null {
    return this.registry.get(windowId);
  }

  listWindows(): WindowController[] {
    return this.registry.list();
  }

  needsConfirmQuit(): boolean {
    return this.registry.needsConfirmQuit();
  }

  /**
   * Swaps in a reloaded configuration for windows opened from now on and
   * tells every open window about it. Open windows keep their chrome.
   */
  onConfigReloaded(config: WindowConfig): void {
    this.config = config;
    for (const window of this.registry.list()) {
      window.onConfigReloaded();
    }
  }

  /**
   * Destroys every open window, invalidating pending close prompts.
   */
  destroyAll(): void {
    const windows = this.registry.list();
    if (windows.length > 0) {
      this.logger.info(`[window-manager] destroying ${windows.length} window(s)`);
    }
    for (const window of windows) {
      window.destroy();
    }
  }
}
