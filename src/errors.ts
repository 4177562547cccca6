export interface JsonErrorPosition {
  offset: number;
  line: number;
  column: number;
}

export class JsonParseError extends Error {
  readonly offset: number;
  readonly line: number;
  readonly column: number;

  constructor(message: string, position: JsonErrorPosition) {
    super(`${message} at line ${position.line}, column ${position.column}`);
    this.name = "JsonParseError";
    this.offset = position.offset;
    this.line = position.line;
    this.column = position.column;
  }
}
