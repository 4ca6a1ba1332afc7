import { describeError, type Logger } from '../utils/logger';
import type { ConfirmPromptOptions, PromptHandle } from './toolkit';
import type { TerminalSurface } from './terminalEngine';

export type CloseConfirmationState =
  | 'idle'
  | 'evaluating'
  | 'awaiting_response'
  | 'closing'
  | 'cancelled';

export type CloseRequestOutcome = 'closed' | 'prompted' | 'already_pending' | 'ignored';

export const CLOSE_PROMPT_TITLE = 'Close this window?';
export const CLOSE_PROMPT_MESSAGE = 'All terminal sessions in this window will be terminated.';

export interface CloseConfirmationControllerOptions {
  windowId: string;
  collectSurfaces: () => TerminalSurface[];
  showPrompt: (options: ConfirmPromptOptions) => PromptHandle;
  close: () => void;
  logger?: Logger;
}

type PendingPrompt = {
  generation: number;
  handle: PromptHandle | null;
};

/**
 * Gate in front of window closure. A close request either closes right away
 * or parks behind a yes/no prompt until the user answers. Destroying the
 * window by any other route must call `cancel()` so a late answer cannot act
 * on it.
 */
export class CloseConfirmationController {
  private state: CloseConfirmationState = 'idle';
  private pending: PendingPrompt | null = null;
  private generation = 0;
  private readonly logger: Logger;

  constructor(private readonly options: CloseConfirmationControllerOptions) {
    this.logger = options.logger ?? console;
  }

  getState(): CloseConfirmationState {
    return this.state;
  }

  hasPendingPrompt(): boolean {
    return this.pending !== null;
  }

  requestClose(): CloseRequestOutcome {
    const { windowId } = this.options;
    if (this.state === 'closing' || this.state === 'cancelled') {
      this.logger.debug?.(`[close-confirm] ${windowId} close request ignored: ${this.state}`);
      return 'ignored';
    }
    if (this.state === 'awaiting_response') {
      return 'already_pending';
    }

    this.state = 'evaluating';
    if (!this.needsConfirmation()) {
      this.finishClose();
      return 'closed';
    }

    this.generation += 1;
    const generation = this.generation;
    this.pending = { generation, handle: null };
    this.state = 'awaiting_response';

    let handle: PromptHandle;
    try {
      handle = this.options.showPrompt({
        title: CLOSE_PROMPT_TITLE,
        message: CLOSE_PROMPT_MESSAGE,
        confirmText: 'Yes',
        cancelText: 'No',
        confirmClassName: 'destructive-action',
        defaultResponse: 'cancel',
        onConfirm: () => {
          this.respond(generation, true);
        },
        onCancel: () => {
          this.respond(generation, false);
        },
      });
    } catch (err) {
      this.logger.error(`[close-confirm] ${windowId} failed to show prompt: ${describeError(err)}`);
      if (this.pending?.generation === generation) {
        this.pending = null;
        this.state = 'idle';
      }
      return 'ignored';
    }

    // The prompt may already have been answered while it was being shown.
    if (this.pending?.generation === generation) {
      this.pending.handle = handle;
    }
    return 'prompted';
  }

  /**
   * Invalidates any pending prompt because the window is going away through
   * another path. Later answers to that prompt are ignored.
   */
  cancel(): void {
    const pending = this.pending;
    this.pending = null;
    if (this.state !== 'closing') {
      this.state = 'cancelled';
    }
    if (pending?.handle) {
      pending.handle.close();
    }
  }

  private respond(generation: number, confirmed: boolean): void {
    const { windowId } = this.options;
    if (!this.pending || this.pending.generation !== generation) {
      this.logger.debug?.(`[close-confirm] ${windowId} ignoring stale prompt response`);
      return;
    }
    this.pending = null;

    if (!confirmed) {
      this.state = 'idle';
      return;
    }
    this.finishClose();
  }

  /**
   * Asks every surface whether it wants confirmation. A failing check is
   * logged and counts as yes.
   */
  needsConfirmation(): boolean {
    const { windowId } = this.options;
    for (const surface of this.options.collectSurfaces()) {
      try {
        if (surface.needsConfirmQuit()) {
          return true;
        }
      } catch (err) {
        this.logger.warn(
          `[close-confirm] ${windowId} surface ${surface.id} confirmation check failed: ${describeError(err)}`,
        );
        return true;
      }
    }
    return false;
  }

  private finishClose(): void {
    this.state = 'closing';
    this.options.close();
  }
}
