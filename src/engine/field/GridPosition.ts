export interface GridPosition {
  readonly column: number;
  readonly row: number;
}

/** Sentinel for "no position" (e.g. the grid is full). */
export const NO_POSITION: GridPosition = Object.freeze({ column: -1, row: -1 });

/** Gates sit behind the grid on this virtual row. */
export const GATE_ROW = -1;

export function gridPosition(column: number, row: number): GridPosition {
  return { column, row };
}

export function positionKey(position: GridPosition): string {
  return `${position.column},${position.row}`;
}

export function samePosition(a: GridPosition, b: GridPosition): boolean {
  return a.column === b.column && a.row === b.row;
}

export function isNoPosition(position: GridPosition): boolean {
  return position.column === -1 && position.row === -1;
}

export function formatPosition(position: GridPosition): string {
  return `(${position.column}, ${position.row})`;
}
