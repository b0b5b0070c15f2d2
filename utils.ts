export function checkAllCasesHandled(a: never): never {
  throw new Error(`Can't be here: ${JSON.stringify(a)}`);
}

export function tryExtractErrorMessage(err: unknown): string {
  return err instanceof Error
    ? err.message
    : typeof err === "string"
    ? err
    : String(err);
}

export type Position = {
  offset: number;
  line: number;
  column: number;
};

// Maps offsets in a text to 1-based line/column pairs
export class LineIndex {
  private lineStarts: number[] = [0];

  constructor(text: string) {
    for (let i = 0; i < text.length; i++) {
      if (text[i] === "\n") {
        this.lineStarts.push(i + 1);
      }
    }
  }

  positionAt(offset: number): Position {
    let low = 0;
    let high = this.lineStarts.length - 1;
    while (low < high) {
      const mid = Math.ceil((low + high) / 2);
      if (this.lineStarts[mid] <= offset) {
        low = mid;
      } else {
        high = mid - 1;
      }
    }
    return { offset, line: low + 1, column: offset - this.lineStarts[low] + 1 };
  }
}
