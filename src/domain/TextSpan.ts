/** Half-open range `[start, start + length)` of character offsets in a document. */
export interface TextSpan {
  readonly start: number;
  readonly length: number;
}

export function createTextSpan(start: number, length: number): TextSpan {
  if (start < 0 || length < 0) {
    throw new RangeError(`Invalid text span: start=${start}, length=${length}`);
  }
  return { start, length };
}

export function textSpanEnd(span: TextSpan): number {
  return span.start + span.length;
}

export function spanKey(span: TextSpan): string {
  return `${span.start}:${span.length}`;
}
