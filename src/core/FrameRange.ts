/**
 * Inclusive range of frame numbers. `start > end` means empty, which is how
 * a zero frame lag is reported: nothing is owed, so nothing is listed.
 */
export class FrameRange implements Iterable<number> {
  readonly start: number;
  readonly end: number;

  constructor(start: number, end: number) {
    this.start = start;
    this.end = end;
  }

  /** Empty range positioned just after `frame`. */
  static empty(frame: number): FrameRange {
    return new FrameRange(frame + 1, frame);
  }

  get isEmpty(): boolean {
    return this.start > this.end;
  }

  get size(): number {
    return this.isEmpty ? 0 : this.end - this.start + 1;
  }

  includes(frame: number): boolean {
    return frame >= this.start && frame <= this.end;
  }

  *[Symbol.iterator](): Iterator<number> {
    for (let f = this.start; f <= this.end; f++) {
      yield f;
    }
  }

  toArray(): number[] {
    return [...this];
  }

  toString(): string {
    return this.isEmpty ? "[]" : `[${this.start}, ${this.end}]`;
  }
}
