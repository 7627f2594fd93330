// Backtracking solver with MRV (Minimum Remaining Values) unit selection

import { Position, PuzzleDefinition } from '../types/puzzle';

export interface SolveOptions {
  /** Stop once this many solutions are found. Defaults to 1. */
  maxSolutions?: number;
}

export interface SolveResult {
  /** Each solution lists its queens sorted by row. */
  solutions: Position[][];
  nodesExplored: number;
  /** True when the whole search space was covered. */
  exhaustive: boolean;
}

interface SearchContext {
  n: number;
  maxSolutions: number;
  /** Cells taken out of play by each cell: its row, column, zone and king neighbours. */
  attacks: number[][];
  zoneCells: number[][];
  blocked: Int32Array;
  rowDone: boolean[];
  colDone: boolean[];
  zoneDone: boolean[];
  zoneOfCell: number[];
  queens: number[];
  solutions: Position[][];
  nodesExplored: number;
  stopped: boolean;
}

function buildContext(definition: PuzzleDefinition, maxSolutions: number): SearchContext {
  const n = definition.size;
  const zoneOfCell: number[] = [];
  const zoneCells: number[][] = Array.from({ length: n }, () => []);
  for (let x = 0; x < n; x++) {
    for (let y = 0; y < n; y++) {
      const zone = definition.zoneOf[x][y];
      zoneOfCell.push(zone);
      zoneCells[zone].push(x * n + y);
    }
  }

  const attacks: number[][] = [];
  for (let cell = 0; cell < n * n; cell++) {
    const x = Math.floor(cell / n);
    const y = cell % n;
    const hit = new Set<number>();
    for (let i = 0; i < n; i++) {
      hit.add(x * n + i);
      hit.add(i * n + y);
    }
    for (const other of zoneCells[zoneOfCell[cell]]) {
      hit.add(other);
    }
    for (let dx = -1; dx <= 1; dx++) {
      for (let dy = -1; dy <= 1; dy++) {
        const nx = x + dx;
        const ny = y + dy;
        if (nx >= 0 && nx < n && ny >= 0 && ny < n) {
          hit.add(nx * n + ny);
        }
      }
    }
    attacks.push([...hit]);
  }

  return {
    n,
    maxSolutions,
    attacks,
    zoneCells,
    blocked: new Int32Array(n * n),
    rowDone: new Array<boolean>(n).fill(false),
    colDone: new Array<boolean>(n).fill(false),
    zoneDone: new Array<boolean>(n).fill(false),
    zoneOfCell,
    queens: [],
    solutions: [],
    nodesExplored: 0,
    stopped: false,
  };
}

function place(ctx: SearchContext, cell: number): void {
  for (const a of ctx.attacks[cell]) {
    ctx.blocked[a] += 1;
  }
  ctx.rowDone[Math.floor(cell / ctx.n)] = true;
  ctx.colDone[cell % ctx.n] = true;
  ctx.zoneDone[ctx.zoneOfCell[cell]] = true;
  ctx.queens.push(cell);
}

function unplace(ctx: SearchContext, cell: number): void {
  for (const a of ctx.attacks[cell]) {
    ctx.blocked[a] -= 1;
  }
  ctx.rowDone[Math.floor(cell / ctx.n)] = false;
  ctx.colDone[cell % ctx.n] = false;
  ctx.zoneDone[ctx.zoneOfCell[cell]] = false;
  ctx.queens.pop();
}

/**
 * Among the rows, columns and zones still lacking a queen, pick the one with
 * the fewest open cells. Returns an empty list when some unit has none left,
 * which means the branch is dead.
 */
function selectMRV(ctx: SearchContext): number[] {
  const { n } = ctx;
  let best: number[] | null = null;

  for (let x = 0; x < n; x++) {
    if (ctx.rowDone[x]) continue;
    const open: number[] = [];
    for (let y = 0; y < n; y++) {
      if (ctx.blocked[x * n + y] === 0) open.push(x * n + y);
    }
    if (open.length === 0) return open;
    if (best === null || open.length < best.length) best = open;
  }
  for (let y = 0; y < n; y++) {
    if (ctx.colDone[y]) continue;
    const open: number[] = [];
    for (let x = 0; x < n; x++) {
      if (ctx.blocked[x * n + y] === 0) open.push(x * n + y);
    }
    if (open.length === 0) return open;
    if (best === null || open.length < best.length) best = open;
  }
  for (let zone = 0; zone < n; zone++) {
    if (ctx.zoneDone[zone]) continue;
    const open = ctx.zoneCells[zone].filter((cell) => ctx.blocked[cell] === 0);
    if (open.length === 0) return open;
    if (best === null || open.length < best.length) best = open;
  }

  return best ?? [];
}

function toSolution(ctx: SearchContext): Position[] {
  return ctx.queens
    .map((cell) => ({ x: Math.floor(cell / ctx.n), y: cell % ctx.n }))
    .sort((a, b) => a.x - b.x);
}

// Recursive backtracking search
function search(ctx: SearchContext): void {
  ctx.nodesExplored++;

  if (ctx.queens.length === ctx.n) {
    ctx.solutions.push(toSolution(ctx));
    if (ctx.solutions.length >= ctx.maxSolutions) {
      ctx.stopped = true;
    }
    return;
  }

  for (const cell of selectMRV(ctx)) {
    place(ctx, cell);
    search(ctx);
    unplace(ctx, cell);
    if (ctx.stopped) return;
  }
}

/**
 * Enumerate solutions of a puzzle: placements of N queens with one per row,
 * column and zone and no two touching corners.
 *
 * The definition is taken as already validated.
 */
export function solvePuzzle(definition: PuzzleDefinition, options: SolveOptions = {}): SolveResult {
  const maxSolutions = Math.max(1, options.maxSolutions ?? 1);
  const ctx = buildContext(definition, maxSolutions);
  search(ctx);
  return {
    solutions: ctx.solutions,
    nodesExplored: ctx.nodesExplored,
    exhaustive: !ctx.stopped,
  };
}

/**
 * Number of solutions, counting no further than `limit`.
 */
export function countSolutions(definition: PuzzleDefinition, limit: number = 2): number {
  return solvePuzzle(definition, { maxSolutions: limit }).solutions.length;
}

export function hasUniqueSolution(definition: PuzzleDefinition): boolean {
  return countSolutions(definition, 2) === 1;
}
