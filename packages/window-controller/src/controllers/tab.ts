import type { SurfaceTree, TerminalSurface } from './terminalEngine';

export interface TabOptions {
  id: string;
  /** Owning window, held by id only. */
  windowId: string;
  tree: SurfaceTree;
}

export class Tab {
  readonly id: string;
  readonly windowId: string;
  private readonly tree: SurfaceTree;
  private destroyed = false;

  constructor(options: TabOptions) {
    this.id = options.id;
    this.windowId = options.windowId;
    this.tree = options.tree;
  }

  get focusedSurface(): TerminalSurface | null {
    if (this.destroyed) {
      return null;
    }
    return this.tree.focusedSurface();
  }

  surfaces(): TerminalSurface[] {
    if (this.destroyed) {
      return [];
    }
    return this.tree.surfaces();
  }

  containsSurface(surface: TerminalSurface): boolean {
    return this.surfaces().some((candidate) => candidate.id === surface.id);
  }

  isDestroyed(): boolean {
    return this.destroyed;
  }

  destroy(): void {
    if (this.destroyed) {
      return;
    }
    this.destroyed = true;
    this.tree.destroy();
  }
}
