/**
 * Holder for an immutable value that is replaced wholesale.
 *
 * Readers take the current reference once and keep using it; writers build
 * a new value off to the side and publish it with swap(). Nothing reachable
 * from a published value is ever mutated.
 */
export class SnapshotCell<T> {
  private value: Readonly<T>;

  constructor(initial: T) {
    this.value = deepFreeze(initial);
  }

  get(): Readonly<T> {
    return this.value;
  }

  swap(next: T): Readonly<T> {
    const previous = this.value;
    this.value = deepFreeze(next);
    return previous;
  }

  /**
   * Derive and publish the next value from the current one in a single
   * synchronous step.
   */
  update(fn: (current: Readonly<T>) => T): Readonly<T> {
    this.value = deepFreeze(fn(this.value));
    return this.value;
  }
}

export function deepFreeze<T>(value: T): T {
  if (value === null || typeof value !== 'object' || Object.isFrozen(value)) {
    return value;
  }
  Object.freeze(value);
  for (const key of Object.keys(value)) {
    deepFreeze(Reflect.get(value, key));
  }
  return value;
}
