import { ValidationError } from "../errors/catalog.js";

/**
 * Read-only window onto a slice of a shared result list. Building one copies
 * nothing; `toArray()` does.
 */
export class PageView<T> implements Iterable<T> {
  constructor(
    private readonly items: readonly T[],
    /** Index of this page's first item in the full list. */
    readonly offset: number,
    readonly length: number,
  ) {}

  at(index: number): T | undefined {
    if (!Number.isInteger(index) || index < 0 || index >= this.length) {
      return undefined;
    }
    return this.items[this.offset + index];
  }

  *[Symbol.iterator](): Iterator<T> {
    for (let i = 0; i < this.length; i++) {
      yield this.items[this.offset + i];
    }
  }

  toArray(): T[] {
    return this.items.slice(this.offset, this.offset + this.length);
  }
}

/**
 * Fixed-size pages over a ranked result list, with a cursor for the page
 * currently on screen.
 */
export class ResultPaginator<T> {
  private items: readonly T[];
  private cursor = 0;

  constructor(
    items: readonly T[],
    readonly pageSize: number,
  ) {
    if (!Number.isInteger(pageSize) || pageSize < 1) {
      throw new ValidationError("Page size must be a positive integer", {
        pageSize,
      });
    }
    this.items = items;
  }

  get totalItems(): number {
    return this.items.length;
  }

  get currentPage(): number {
    return this.cursor;
  }

  pageCount(): number {
    return Math.ceil(this.items.length / this.pageSize);
  }

  /** Page 0 of an empty list is an empty view; any other missing page throws. */
  page(n: number): PageView<T> {
    const lastPage = Math.max(0, this.pageCount() - 1);
    if (!Number.isInteger(n) || n < 0 || n > lastPage) {
      throw new ValidationError(
        `Page ${n} is out of range (0-${lastPage})`,
        { page: n, pageCount: this.pageCount() },
      );
    }
    const offset = n * this.pageSize;
    const length = Math.min(this.pageSize, this.items.length - offset);
    return new PageView(this.items, offset, length);
  }

  current(): PageView<T> {
    return this.page(this.cursor);
  }

  hasNext(): boolean {
    return this.cursor + 1 < this.pageCount();
  }

  hasPrevious(): boolean {
    return this.cursor > 0;
  }

  /** Advances when there is a next page; returns the page now current. */
  next(): PageView<T> {
    if (this.hasNext()) this.cursor++;
    return this.current();
  }

  /** Steps back when there is a previous page; returns the page now current. */
  previous(): PageView<T> {
    if (this.hasPrevious()) this.cursor--;
    return this.current();
  }

  goTo(n: number): PageView<T> {
    const view = this.page(n);
    this.cursor = n;
    return view;
  }

  /** Swaps in a new result list and rewinds to page 0. */
  replace(items: readonly T[]): void {
    this.items = items;
    this.cursor = 0;
  }
}
