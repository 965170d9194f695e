import type { Point, SourceRange } from '../parser/types.js';

/**
 * Maps string offsets to zero-based row/column points. Built once per parse;
 * lookups are a binary search over line start offsets.
 */
export class LineIndex {
  private lineStarts: number[] = [0];

  constructor(private text: string) {
    for (let i = 0; i < text.length; i++) {
      if (text[i] === '\n') {
        this.lineStarts.push(i + 1);
      }
    }
  }

  get lineCount(): number {
    return this.lineStarts.length;
  }

  pointAt(offset: number): Point {
    const clamped = Math.max(0, Math.min(offset, this.text.length));
    let lo = 0;
    let hi = this.lineStarts.length - 1;
    while (lo < hi) {
      const mid = (lo + hi + 1) >> 1;
      if (this.lineStarts[mid] <= clamped) {
        lo = mid;
      } else {
        hi = mid - 1;
      }
    }
    return { row: lo, column: clamped - this.lineStarts[lo] };
  }

  rangeOf(startIndex: number, endIndex: number): SourceRange {
    return {
      startIndex,
      endIndex,
      start: this.pointAt(startIndex),
      end: this.pointAt(endIndex),
    };
  }
}
