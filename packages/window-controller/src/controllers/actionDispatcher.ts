/**
 * Action dispatcher for window-level actions
 *
 * Turns a menu or keybinding action id into a binding action and hands it to
 * the surface that currently holds focus. Engine rejections are logged and
 * reported in the result; they never propagate to the caller.
 */

import { toBindingAction, type BindingAction, type BindingActionId } from '@termshell/shared';

import { describeError, type Logger } from '../utils/logger';
import type { TerminalSurface } from './terminalEngine';

export const COPIED_TO_CLIPBOARD_MESSAGE = 'Copied to clipboard';

export type DispatchResult =
  | { status: 'dispatched'; actionId: BindingActionId; action: BindingAction }
  | { status: 'no_surface'; actionId: BindingActionId }
  | { status: 'failed'; actionId: BindingActionId; error: string };

export interface DispatchContext {
  /** Shows a transient acknowledgment; omitted when the window has no toast support. */
  notify?: (message: string) => void;
}

export interface ActionDispatcherOptions {
  logger?: Logger;
}

export class ActionDispatcher {
  private readonly logger: Logger;

  constructor(options: ActionDispatcherOptions = {}) {
    this.logger = options.logger ?? console;
  }

  dispatch(
    surface: TerminalSurface | null,
    actionId: BindingActionId,
    context: DispatchContext = {},
  ): DispatchResult {
    if (!surface) {
      this.logger.debug?.(`[actions] ${actionId} dropped: no focused surface`);
      return { status: 'no_surface', actionId };
    }

    const action = toBindingAction(actionId);
    let accepted: boolean | void;
    try {
      accepted = surface.performBindingAction(action);
    } catch (err) {
      const error = describeError(err);
      this.logger.warn(
        `[actions] error performing binding action ${action.type} on surface ${surface.id}: ${error}`,
      );
      return { status: 'failed', actionId, error };
    }
    if (accepted === false) {
      const error = 'rejected by the terminal engine';
      this.logger.warn(
        `[actions] binding action ${action.type} ${error} on surface ${surface.id}`,
      );
      return { status: 'failed', actionId, error };
    }

    if (actionId === 'copy_to_clipboard') {
      context.notify?.(COPIED_TO_CLIPBOARD_MESSAGE);
    }

    return { status: 'dispatched', actionId, action };
  }
}
