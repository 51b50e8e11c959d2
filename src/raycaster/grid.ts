/**
 * Map grid and levels
 *
 * Maps are y-first: cells[row][col]. Coordinates in map-cell units,
 * truncated toward zero to find the containing cell.
 */

export type Cell = 'wall' | 'floor';

export interface MapGrid {
  readonly cells: ReadonlyArray<ReadonlyArray<Cell>>;
  readonly width: number;
  readonly height: number;
}

export interface StartPose {
  x: number;
  y: number;
  angle: number;  // radians
}

export interface Level {
  grid: MapGrid;
  start: StartPose;
}

const WALL_CHAR = '#';
const FLOOR_CHAR = '.';
const START_CHAR = 'P';

// ============================================================================
// DEFAULT LEVEL
// ============================================================================

const DEFAULT_MAP = [
  '############',
  '#..........#',
  '#..........#',
  '#..........#',
  '#..........#',
  '############',
];

export function createDefaultLevel(): Level {
  return {
    grid: parseGrid(DEFAULT_MAP),
    start: { x: 3.0, y: 3.0, angle: 0 },
  };
}

// ============================================================================
// PARSING
// ============================================================================

/**
 * Build an immutable grid from rows of '#' (wall) and '.' (floor).
 * Throws on an empty or ragged map.
 */
export function parseGrid(rows: readonly string[]): MapGrid {
  if (rows.length === 0 || rows[0].length === 0) {
    throw new Error('Map grid is empty');
  }

  const width = rows[0].length;
  const cells: Cell[][] = rows.map((line, y) => {
    if (line.length !== width) {
      throw new Error(`Map row ${y + 1} has ${line.length} cells, expected ${width}`);
    }
    return [...line].map((ch, x) => {
      if (ch === WALL_CHAR) return 'wall';
      if (ch === FLOOR_CHAR) return 'floor';
      throw new Error(`Unknown map character '${ch}' at row ${y + 1}, column ${x + 1}`);
    });
  });

  return Object.freeze({
    cells: Object.freeze(cells.map(row => Object.freeze(row))),
    width,
    height: cells.length,
  });
}

/**
 * Parse a level file. A single 'P' marks the start cell (a floor cell);
 * without one the player starts in the first floor cell.
 */
export function parseLevel(lines: readonly string[]): Level {
  const rows = trimTrailingBlank(lines.map(line => line.replace(/\r$/, '')));

  let start: StartPose | null = null;
  const gridRows: string[] = [];
  for (let y = 0; y < rows.length; y++) {
    const line = rows[y];
    const x = line.indexOf(START_CHAR);
    if (x === -1) {
      gridRows.push(line);
      continue;
    }
    if (start || line.indexOf(START_CHAR, x + 1) !== -1) {
      throw new Error('Map has more than one start marker');
    }
    start = { x: x + 0.5, y: y + 0.5, angle: 0 };
    gridRows.push(line.replace(START_CHAR, FLOOR_CHAR));
  }

  const grid = parseGrid(gridRows);
  const pose = start ?? findFirstFloor(grid);
  if (!pose) {
    throw new Error('Map has no floor cell to start on');
  }
  return { grid, start: pose };
}

function findFirstFloor(grid: MapGrid): StartPose | null {
  for (let y = 0; y < grid.height; y++) {
    for (let x = 0; x < grid.width; x++) {
      if (grid.cells[y][x] === 'floor') return { x: x + 0.5, y: y + 0.5, angle: 0 };
    }
  }
  return null;
}

function trimTrailingBlank(lines: string[]): string[] {
  let end = lines.length;
  while (end > 0 && lines[end - 1].trim() === '') end--;
  return lines.slice(0, end);
}

// ============================================================================
// QUERIES
// ============================================================================

/**
 * Cell containing (x, y), or undefined outside the grid.
 */
export function cellAt(grid: MapGrid, x: number, y: number): Cell | undefined {
  const mx = Math.trunc(x);
  const my = Math.trunc(y);
  if (my < 0 || my >= grid.height || mx < 0 || mx >= grid.width) return undefined;
  return grid.cells[my][mx];
}

export function isFloor(grid: MapGrid, x: number, y: number): boolean {
  return cellAt(grid, x, y) === 'floor';
}
