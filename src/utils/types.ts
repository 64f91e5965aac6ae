/** A point in source text; `line` and `column` are 1-based, as peggy reports them. */
export interface Position {
  line: number;
  column: number;
  offset: number;
}

export interface Location {
  start: Position;
  end: Position;
}

export function pointLocation(position: Position): Location {
  return { start: position, end: position };
}
