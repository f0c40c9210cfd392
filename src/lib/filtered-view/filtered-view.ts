/**
 * Filtered View
 *
 * Lazy adaptor over an iterable: yields transform(element) for each
 * element the predicate accepts. Nothing is buffered, and every
 * iteration pass starts again from the beginning of the source, so the
 * source must itself be restartable (arrays, Sets, QueryParams...).
 * A generator object can only be walked once.
 */

export type Predicate<E> = (element: E) => boolean;
export type Transform<E, T> = (element: E) => T;

/**
 * Position in a filtered view
 *
 * Always rests on an accepted element or at the end.
 */
export class FilteredCursor<E, T> {
  private readonly source: Iterator<E>;
  private readonly predicate: Predicate<E>;
  private readonly transform: Transform<E, T>;
  private current: IteratorResult<E>;

  constructor(source: Iterator<E>, predicate: Predicate<E>, transform: Transform<E, T>) {
    this.source = source;
    this.predicate = predicate;
    this.transform = transform;
    this.current = source.next();
    this.skipRejected();
  }

  get done(): boolean {
    return this.current.done === true;
  }

  /**
   * The accepted source element under the cursor
   */
  get element(): E {
    if (this.current.done) {
      throw new RangeError('Cursor is past the end of the view');
    }
    return this.current.value;
  }

  /**
   * Transformed value of the current element, recomputed on every read
   */
  get value(): T {
    return this.transform(this.element);
  }

  advance(): this {
    if (!this.current.done) {
      this.current = this.source.next();
      this.skipRejected();
    }
    return this;
  }

  private skipRejected(): void {
    while (!this.current.done && !this.predicate(this.current.value)) {
      this.current = this.source.next();
    }
  }
}

export class FilteredView<E, T = E> implements Iterable<T> {
  private readonly source: Iterable<E>;
  private readonly predicate: Predicate<E>;
  private readonly transform: Transform<E, T>;

  constructor(source: Iterable<E>, predicate: Predicate<E>, transform: Transform<E, T>) {
    this.source = source;
    this.predicate = predicate;
    this.transform = transform;
  }

  /**
   * Cursor on the first accepted element, or an ended cursor
   */
  begin(): FilteredCursor<E, T> {
    return new FilteredCursor(this.source[Symbol.iterator](), this.predicate, this.transform);
  }

  *[Symbol.iterator](): Iterator<T> {
    for (const cursor = this.begin(); !cursor.done; cursor.advance()) {
      yield cursor.value;
    }
  }

  isEmpty(): boolean {
    return this.begin().done;
  }

  first(): T | undefined {
    const cursor = this.begin();
    return cursor.done ? undefined : cursor.value;
  }

  /**
   * Number of accepted elements; does not call the transform
   */
  count(): number {
    let n = 0;
    for (const cursor = this.begin(); !cursor.done; cursor.advance()) {
      n++;
    }
    return n;
  }

  toArray(): T[] {
    return Array.from(this);
  }
}

/**
 * Build a filtered view; without a transform the accepted elements are
 * yielded as they are.
 */
export function filtered<E>(source: Iterable<E>, predicate: Predicate<E>): FilteredView<E, E>;
export function filtered<E, T>(
  source: Iterable<E>,
  predicate: Predicate<E>,
  transform: Transform<E, T>
): FilteredView<E, T>;
export function filtered<E, T>(
  source: Iterable<E>,
  predicate: Predicate<E>,
  transform?: Transform<E, T>
): FilteredView<E, E> | FilteredView<E, T> {
  if (transform) {
    return new FilteredView(source, predicate, transform);
  }
  return new FilteredView(source, predicate, (element: E) => element);
}
