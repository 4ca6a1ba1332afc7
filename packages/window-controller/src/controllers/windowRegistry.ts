import type { WindowController } from './windowController';

/**
 * Process-wide set of open windows. Windows enter on creation and leave when
 * they are destroyed.
 */
export class WindowRegistry {
  private readonly windowsById = new Map<string, WindowController>();

  register(window: WindowController): void {
    if (this.windowsById.has(window.id)) {
      throw new Error(`Window "${window.id}" is already registered`);
    }
    this.windowsById.set(window.id, window);
  }

  unregister(window: WindowController): boolean {
    if (this.windowsById.get(window.id) !== window) {
      return false;
    }
    return this.windowsById.delete(window.id);
  }

  get(windowId: string): WindowController | null {
    return this.windowsById.get(windowId) ?? null;
  }

  list(): WindowController[] {
    return Array.from(this.windowsById.values());
  }

  get size(): number {
    return this.windowsById.size;
  }

  /**
   * True when any surface of any open window wants confirmation before quit.
   */
  needsConfirmQuit(): boolean {
    return this.list().some((window) => window.needsConfirmQuit());
  }
}
