import type { WindowSize } from '@termshell/shared';

import type { WindowChrome } from '../utils/windowChrome';
import type { WindowEventBus } from './windowEventBus';

export type PromptResponse = 'confirm' | 'cancel';

export interface ConfirmPromptOptions {
  title: string;
  message: string;
  confirmText: string;
  cancelText: string;
  /** Style class applied to the confirm button, e.g. a destructive marker. */
  confirmClassName: string;
  /** Response chosen when the prompt is dismissed through its default action. */
  defaultResponse: PromptResponse;
  onConfirm: () => void;
  onCancel: () => void;
}

export interface PromptHandle {
  /** Removes the prompt without invoking either callback. */
  close(): void;
}

export interface ToastOptions {
  title: string;
  timeoutSeconds: number;
}

export interface AboutInfo {
  name: string;
  version: string;
  website?: string;
  issueUrl?: string;
}

export interface WindowChromeSpec {
  windowId: string;
  title: string;
  defaultSize: WindowSize;
  fullscreen: boolean;
  decorated: boolean;
  titleBarVisible: boolean;
  chrome: WindowChrome;
}

/**
 * Commands the controller sends to one native window.
 */
export interface NativeWindow {
  setTitle(title: string): void;
  setFullscreen(fullscreen: boolean): void;
  setDecorated(decorated: boolean): void;
  setTitleBarVisible(visible: boolean): void;
  showConfirmPrompt(options: ConfirmPromptOptions): PromptHandle;
  showToast(options: ToastOptions): void;
  showAboutDialog(info: AboutInfo): void;
  destroy(): void;
}

export interface ToolkitAdapter {
  /**
   * Builds the native window. The adapter reports the window's events on
   * `events` for as long as the window lives.
   */
  createWindow(spec: WindowChromeSpec, events: WindowEventBus): NativeWindow;
}
