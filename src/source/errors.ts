export class SourceParseError extends Error {
  readonly line: number;
  readonly column: number;

  constructor(message: string, line: number, column: number) {
    super(message);
    this.name = "SourceParseError";
    this.line = line;
    this.column = column;
  }
}
