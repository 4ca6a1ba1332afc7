import { EventEmitter } from 'node:events';

/**
 * Events the toolkit adapter reports for a native window. Every event names
 * the window it came from so listeners never need to recover it themselves.
 */
export type WindowEvent =
  | { type: 'close_request'; windowId: string }
  | { type: 'destroy'; windowId: string }
  | { type: 'action_invoked'; windowId: string; actionId: string }
  | { type: 'new_tab_clicked'; windowId: string }
  | { type: 'tab_overview_create'; windowId: string }
  | { type: 'context_menu_closed'; windowId: string };

const ANY_EVENT = 'window_event';

export class WindowEventBus {
  private readonly emitter = new EventEmitter();

  emit(event: WindowEvent): void {
    this.emitter.emit(ANY_EVENT, event);
  }

  subscribe(listener: (event: WindowEvent) => void): () => void {
    this.emitter.on(ANY_EVENT, listener);
    return () => {
      this.emitter.off(ANY_EVENT, listener);
    };
  }

  listenerCount(): number {
    return this.emitter
      .eventNames()
      .reduce((total, name) => total + this.emitter.listenerCount(name), 0);
  }

  clear(): void {
    this.emitter.removeAllListeners();
  }
}
