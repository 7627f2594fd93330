import { Position, PuzzleDefinition, ZoneId, positionToString } from '../types/puzzle';
import { MalformedPuzzleDefinition, PuzzleDefinitionIssue } from '../engine/errors';
import { isValidSolution } from '../engine/boardInvariants';
import { getOrthogonalNeighbors, isValidPosition } from '../engine/validators/utils';
import { MAX_PUZZLE_SIZE } from './constants';

/**
 * Build a PuzzleDefinition from per-zone cell lists (`zones[id]` holds the
 * cells of zone `id`) and validate it. Throws MalformedPuzzleDefinition
 * listing every problem found.
 */
export function createPuzzleDefinition(
  size: number,
  zones: ReadonlyArray<ReadonlyArray<Position>>,
  canonicalSolution?: ReadonlyArray<Position>
): PuzzleDefinition {
  const issues: PuzzleDefinitionIssue[] = [];

  if (!isSupportedSize(size)) {
    throw new MalformedPuzzleDefinition([
      { path: 'size', message: `must be an integer between 1 and ${MAX_PUZZLE_SIZE}` },
    ]);
  }

  if (zones.length !== size) {
    issues.push({ path: 'zones', message: `expected ${size} zones, got ${zones.length}` });
  }

  const zoneOf: ZoneId[][] = Array.from({ length: size }, () => new Array<ZoneId>(size).fill(-1));
  let assigned = 0;

  zones.forEach((cells, zone) => {
    if (cells.length === 0) {
      issues.push({ path: `zones[${zone}]`, message: 'zone has no cells' });
    }
    cells.forEach((cell, i) => {
      const path = `zones[${zone}][${i}]`;
      if (!isValidPosition(cell, size)) {
        issues.push({ path, message: `cell (${cell.x}, ${cell.y}) is outside the grid` });
        return;
      }
      const existing = zoneOf[cell.x][cell.y];
      if (existing !== -1) {
        issues.push({
          path,
          message: `cell ${positionToString(cell)} already belongs to zone ${existing}`,
        });
        return;
      }
      zoneOf[cell.x][cell.y] = zone;
      assigned += 1;
    });
  });

  if (assigned !== size * size) {
    const missing: string[] = [];
    zoneOf.forEach((row, x) =>
      row.forEach((zone, y) => {
        if (zone === -1) missing.push(positionToString({ x, y }));
      })
    );
    if (missing.length > 0) {
      issues.push({ path: 'zones', message: `cells not assigned to any zone: ${missing.join(' ')}` });
    }
  }

  if (issues.length > 0) {
    throw new MalformedPuzzleDefinition(issues);
  }

  const definition: PuzzleDefinition = canonicalSolution
    ? { size, zoneOf, canonicalSolution: canonicalSolution.map((p) => ({ x: p.x, y: p.y })) }
    : { size, zoneOf };

  assertValidPuzzleDefinition(definition);
  return definition;
}

/**
 * Check every PuzzleDefinition invariant and return the problems found.
 * An empty list means the definition is usable.
 */
export function validatePuzzleDefinition(definition: PuzzleDefinition): PuzzleDefinitionIssue[] {
  const { size } = definition;
  if (!isSupportedSize(size)) {
    return [{ path: 'size', message: `must be an integer between 1 and ${MAX_PUZZLE_SIZE}` }];
  }

  const issues: PuzzleDefinitionIssue[] = [];

  if (definition.zoneOf.length !== size) {
    issues.push({ path: 'zoneOf', message: `expected ${size} rows, got ${definition.zoneOf.length}` });
    return issues;
  }

  const zoneSizes = new Array<number>(size).fill(0);
  definition.zoneOf.forEach((row, x) => {
    if (row.length !== size) {
      issues.push({ path: `zoneOf[${x}]`, message: `expected ${size} cells, got ${row.length}` });
      return;
    }
    row.forEach((zone, y) => {
      if (!Number.isInteger(zone) || zone < 0 || zone >= size) {
        issues.push({ path: `zoneOf[${x}][${y}]`, message: `zone id ${zone} is out of range` });
        return;
      }
      zoneSizes[zone] += 1;
    });
  });
  if (issues.length > 0) {
    return issues;
  }

  zoneSizes.forEach((count, zone) => {
    if (count === 0) {
      issues.push({ path: `zone ${zone}`, message: 'zone has no cells' });
    } else if (!isZoneConnected(definition.zoneOf, zone)) {
      issues.push({ path: `zone ${zone}`, message: 'zone cells are not connected' });
    }
  });

  const solution = definition.canonicalSolution;
  if (solution) {
    const offBoard = solution.filter((p) => !isValidPosition(p, size));
    if (offBoard.length > 0) {
      issues.push({
        path: 'canonicalSolution',
        message: `cells outside the grid: ${offBoard.map(positionToString).join(' ')}`,
      });
    } else if (!isValidSolution(definition, solution)) {
      issues.push({
        path: 'canonicalSolution',
        message: 'solution must place one queen per row, column and zone with no touching corners',
      });
    }
  }

  return issues;
}

/**
 * Throws MalformedPuzzleDefinition when the definition breaks an invariant.
 */
export function assertValidPuzzleDefinition(definition: PuzzleDefinition): void {
  const issues = validatePuzzleDefinition(definition);
  if (issues.length > 0) {
    throw new MalformedPuzzleDefinition(issues);
  }
}

/**
 * Per-zone cell lists in row-major order, indexed by ZoneId.
 */
export function getZoneCells(definition: PuzzleDefinition): Position[][] {
  const zones: Position[][] = Array.from({ length: definition.size }, () => []);
  definition.zoneOf.forEach((row, x) => {
    row.forEach((zone, y) => {
      zones[zone].push({ x, y });
    });
  });
  return zones;
}

/**
 * True iff the cells of `zone` form one 4-connected region. `excluded`
 * cells are treated as not belonging to the zone, which lets callers ask
 * whether the zone would stay connected after giving a cell away.
 */
export function isZoneConnected(
  zoneOf: ReadonlyArray<ReadonlyArray<ZoneId>>,
  zone: ZoneId,
  excluded?: Position
): boolean {
  const size = zoneOf.length;
  const inZone = (p: Position): boolean =>
    zoneOf[p.x][p.y] === zone && !(excluded && excluded.x === p.x && excluded.y === p.y);

  let total = 0;
  let start: Position | null = null;
  for (let x = 0; x < size; x++) {
    for (let y = 0; y < size; y++) {
      if (inZone({ x, y })) {
        total += 1;
        if (start === null) start = { x, y };
      }
    }
  }
  if (start === null) {
    return false;
  }

  const seen = new Set<string>([positionToString(start)]);
  const stack: Position[] = [start];
  while (stack.length > 0) {
    const current = stack.pop();
    if (!current) break;
    for (const next of getOrthogonalNeighbors(current, size)) {
      const key = positionToString(next);
      if (!seen.has(key) && inZone(next)) {
        seen.add(key);
        stack.push(next);
      }
    }
  }
  return seen.size === total;
}

function isSupportedSize(size: number): boolean {
  return Number.isInteger(size) && size >= 1 && size <= MAX_PUZZLE_SIZE;
}
