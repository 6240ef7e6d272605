export class PositionId {
  constructor(
    public readonly filePath: string,
    public readonly line: number,
    public readonly character: number,
  ) {}

  static parse(idString: string): PositionId {
    const parts = idString.split(':');
    // The path itself may contain colons (e.g. Windows drive letters),
    // so line and character are always taken from the end.
    if (parts.length < 3) {
      throw new Error(`Invalid ID format: ${idString}`);
    }

    const charStr = parts[parts.length - 1];
    const lineStr = parts[parts.length - 2];
    const filePath = parts.slice(0, -2).join(':');

    const char = Number(charStr);
    const line = Number(lineStr);

    if (!Number.isInteger(char) || !Number.isInteger(line) || !charStr || !lineStr) {
      throw new Error(`Invalid line or character in ID: ${idString}`);
    }
    if (line < 1 || char < 1) {
      throw new Error(`Line and character are 1-based in ID: ${idString}`);
    }
    if (!filePath) {
      throw new Error(`Missing file path in ID: ${idString}`);
    }

    return new PositionId(filePath, line, char);
  }

  toString(): string {
    return `${this.filePath}:${this.line}:${this.character}`;
  }

  compareTo(other: PositionId): number {
    if (this.filePath !== other.filePath) {
      return this.filePath.localeCompare(other.filePath);
    }
    if (this.line !== other.line) {
      return this.line - other.line;
    }
    return this.character - other.character;
  }

  equals(other: PositionId): boolean {
    return (
      this.filePath === other.filePath &&
      this.line === other.line &&
      this.character === other.character
    );
  }
}
