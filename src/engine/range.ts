/**
 * Half-open integer interval `[start, stop)`.
 *
 * Used as the reference of `in` / `not in` branch keys, e.g.
 * `['in', range(130, 140)]` accepts 130..139 and rejects 139.5.
 */
export class IntegerRange {
  constructor(
    readonly start: number,
    readonly stop: number
  ) {
    if (!Number.isInteger(start) || !Number.isInteger(stop)) {
      throw new RangeError(`range bounds must be integers, got ${start} and ${stop}`);
    }
  }

  has(value: unknown): boolean {
    return typeof value === 'number'
      && Number.isInteger(value)
      && value >= this.start
      && value < this.stop;
  }

  get size(): number {
    return Math.max(0, this.stop - this.start);
  }

  toString(): string {
    return `range(${this.start}, ${this.stop})`;
  }

  toJSON(): { range: [number, number] } {
    return { range: [this.start, this.stop] };
  }
}

export function range(start: number, stop: number): IntegerRange {
  return new IntegerRange(start, stop);
}
