/**
 * Query-only view of a tab collection, for callers outside the owning window.
 */
export interface ReadonlyTabCollection<T extends { readonly id: string }> {
  readonly count: number;
  readonly currentIndex: number | null;
  isEmpty(): boolean;
  toArray(): T[];
  at(index: number): T | null;
  findById(id: string): T | null;
  getCurrent(): T | null;
}

/**
 * Ordered tabs of one window with a single current selection.
 *
 * Insertion order is navigation order. `currentIndex` is a valid index while
 * the collection holds tabs and `null` once it is empty. Navigation clamps at
 * both ends; it never wraps around.
 */
export class TabCollection<T extends { readonly id: string }>
  implements ReadonlyTabCollection<T>
{
  private readonly items: T[] = [];
  private current: number | null = null;

  get count(): number {
    return this.items.length;
  }

  get currentIndex(): number | null {
    return this.current;
  }

  isEmpty(): boolean {
    return this.items.length === 0;
  }

  toArray(): T[] {
    return [...this.items];
  }

  at(index: number): T | null {
    return this.items[index] ?? null;
  }

  indexOf(item: T): number {
    return this.items.findIndex((candidate) => candidate.id === item.id);
  }

  findById(id: string): T | null {
    return this.items.find((candidate) => candidate.id === id) ?? null;
  }

  has(item: T): boolean {
    return this.indexOf(item) !== -1;
  }

  getCurrent(): T | null {
    if (this.current === null) {
      return null;
    }
    return this.items[this.current] ?? null;
  }

  /**
   * A view that reads through to this collection and cannot change it.
   */
  asReadonly(): ReadonlyTabCollection<T> {
    return new ReadonlyTabView(this);
  }

  /**
   * Adds `item` at the end and selects it.
   */
  append(item: T): number {
    if (this.has(item)) {
      throw new Error(`Tab ${item.id} is already in the collection`);
    }
    this.items.push(item);
    this.current = this.items.length - 1;
    return this.current;
  }

  /**
   * Removes `item` and repairs the selection: the tab that shifts into the
   * vacated slot becomes current, or the new last tab when the removed one
   * was last. Removing a tab before the current one keeps the same tab
   * selected.
   */
  remove(item: T): boolean {
    const index = this.indexOf(item);
    if (index === -1) {
      return false;
    }
    this.items.splice(index, 1);

    if (this.items.length === 0) {
      this.current = null;
      return true;
    }

    if (this.current === null) {
      this.current = 0;
    } else if (index < this.current) {
      this.current -= 1;
    } else if (index === this.current) {
      this.current = Math.min(index, this.items.length - 1);
    }
    return true;
  }

  select(index: number): boolean {
    if (!Number.isInteger(index) || index < 0 || index >= this.items.length) {
      return false;
    }
    if (this.current === index) {
      return false;
    }
    this.current = index;
    return true;
  }

  gotoNext(anchor?: T): boolean {
    const from = this.resolveAnchor(anchor);
    if (from === null) {
      return false;
    }
    return this.select(from + 1);
  }

  gotoPrevious(anchor?: T): boolean {
    const from = this.resolveAnchor(anchor);
    if (from === null) {
      return false;
    }
    return this.select(from - 1);
  }

  /**
   * Selects the `n`th tab, counting from 1. Zero is reserved and never
   * selects anything.
   */
  gotoNth(n: number): boolean {
    if (!Number.isInteger(n) || n <= 0) {
      return false;
    }
    return this.select(n - 1);
  }

  gotoLast(): boolean {
    return this.select(Math.max(0, this.items.length - 1));
  }

  clear(): T[] {
    const removed = this.items.splice(0, this.items.length);
    this.current = null;
    return removed;
  }

  private resolveAnchor(anchor: T | undefined): number | null {
    if (anchor === undefined) {
      return this.current;
    }
    const index = this.indexOf(anchor);
    return index === -1 ? null : index;
  }
}

class ReadonlyTabView<T extends { readonly id: string }> implements ReadonlyTabCollection<T> {
  constructor(private readonly collection: TabCollection<T>) {}

  get count(): number {
    return this.collection.count;
  }

  get currentIndex(): number | null {
    return this.collection.currentIndex;
  }

  isEmpty(): boolean {
    return this.collection.isEmpty();
  }

  toArray(): T[] {
    return this.collection.toArray();
  }

  at(index: number): T | null {
    return this.collection.at(index);
  }

  findById(id: string): T | null {
    return this.collection.findById(id);
  }

  getCurrent(): T | null {
    return this.collection.getCurrent();
  }
}
