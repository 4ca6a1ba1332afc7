import type { BindingAction } from '@termshell/shared';

/**
 * A single terminal session as seen from the window controller. The engine
 * owns the surface; the controller only holds it through the tab's tree.
 */
export interface TerminalSurface {
  readonly id: string;
  /** True when a foreground process or unsaved state should block a silent close. */
  needsConfirmQuit(): boolean;
  /** Returns false, or throws, when the engine rejects the action. */
  performBindingAction(action: BindingAction): boolean | void;
  focus(): void;
}

/**
 * The split arrangement of surfaces inside one tab.
 */
export interface SurfaceTree {
  focusedSurface(): TerminalSurface | null;
  surfaces(): TerminalSurface[];
  destroy(): void;
}

export interface SurfaceTreeInitOptions {
  /**
   * Surface whose working directory and environment the new tree inherits.
   */
  parent: TerminalSurface | null;
  /** Called by the engine once the last surface in the tree has closed. */
  onEmpty: () => void;
}

export interface SurfaceTreeFactory {
  createSurfaceTree(options: SurfaceTreeInitOptions): SurfaceTree;
}
