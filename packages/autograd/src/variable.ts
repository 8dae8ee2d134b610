/**
 * Handle to a value recorded on a tape.
 *
 * `index` locates the variable's node; it is only meaningful on the tape
 * that produced it, and only for gradients if that tape was tracking.
 */
export class Variable<T> {
  readonly index: number;
  readonly value: T;

  constructor(index: number, value: T) {
    this.index = index;
    this.value = value;
  }

  toString(): string {
    return String(this.value);
  }
}
