/**
 * Grid model — fixed-size occupancy map.
 *
 * Queries are side-effect free. Occupancy is rewritten by paintGrid()
 * after the snake moves or the spawner places something.
 */

import type { CellKind, Coordinate, Food, Grid, GridSize, PortalPair } from './types';

export function createGrid(size: GridSize): Grid {
  return {
    width: size.width,
    height: size.height,
    cells: new Array<CellKind>(size.width * size.height).fill('empty'),
  };
}

export function coordKey(c: Coordinate): string {
  return `${c.x},${c.y}`;
}

export function sameCoord(a: Coordinate, b: Coordinate): boolean {
  return a.x === b.x && a.y === b.y;
}

export function isInBounds(grid: GridSize, c: Coordinate): boolean {
  return c.x >= 0 && c.x < grid.width && c.y >= 0 && c.y < grid.height;
}

/**
 * Map a coordinate back onto the board (Ghost / wrap-around walls).
 */
export function wrapCoordinate(grid: GridSize, c: Coordinate): Coordinate {
  return {
    x: ((c.x % grid.width) + grid.width) % grid.width,
    y: ((c.y % grid.height) + grid.height) % grid.height,
  };
}

export function cellAt(grid: Grid, c: Coordinate): CellKind {
  if (!isInBounds(grid, c)) return 'wall';
  return grid.cells[c.y * grid.width + c.x];
}

export function isOccupiedBySnake(grid: Grid, c: Coordinate): boolean {
  return cellAt(grid, c) === 'snake';
}

export function setCell(grid: Grid, c: Coordinate, kind: CellKind): void {
  if (!isInBounds(grid, c)) return;
  grid.cells[c.y * grid.width + c.x] = kind;
}

export interface GridContents {
  body: readonly Coordinate[];
  foods: readonly Food[];
  obstacles: readonly Coordinate[];
  exit: Coordinate | null;
  portals: readonly PortalPair[];
}

/**
 * Rewrite occupancy from scratch. Snake wins over everything it overlaps
 * (Ghost can carry the head across an obstacle).
 */
export function paintGrid(grid: Grid, contents: GridContents): void {
  grid.cells.fill('empty');
  for (const o of contents.obstacles) setCell(grid, o, 'obstacle');
  if (contents.exit) setCell(grid, contents.exit, 'exit');
  for (const [a, b] of contents.portals) {
    setCell(grid, a, 'portal');
    setCell(grid, b, 'portal');
  }
  for (const f of contents.foods) setCell(grid, f.position, 'food');
  for (const seg of contents.body) setCell(grid, seg, 'snake');
}

/**
 * All empty cells, row by row.
 */
export function emptyCells(grid: Grid): Coordinate[] {
  const result: Coordinate[] = [];
  for (let y = 0; y < grid.height; y++) {
    for (let x = 0; x < grid.width; x++) {
      if (grid.cells[y * grid.width + x] === 'empty') result.push({ x, y });
    }
  }
  return result;
}

/**
 * Where a head entering `c` comes out, or null when `c` is not a portal.
 */
export function portalExit(portals: readonly PortalPair[], c: Coordinate): Coordinate | null {
  for (const [a, b] of portals) {
    if (sameCoord(a, c)) return b;
    if (sameCoord(b, c)) return a;
  }
  return null;
}
