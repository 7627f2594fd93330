import { Position, ZoneId, positionToString } from '../types/puzzle';
import { getOrthogonalNeighbors } from '../engine/validators/utils';
import { SeededRNG } from '../utils/rng';
import { isZoneConnected } from './definition';

const UNCLAIMED = -1;

/**
 * Grow N connected zones around a queen placement.
 *
 * Zone i starts at `queens[i]`. Each step draws a random unclaimed cell that
 * touches a claimed one and hands it to the zone of a random claimed
 * neighbour. Zones only ever grow through shared edges, so each one stays
 * 4-connected and holds exactly one of the queens.
 */
export function growZones(n: number, queens: ReadonlyArray<Position>, rng: SeededRNG): ZoneId[][] {
  const zoneOf: ZoneId[][] = Array.from({ length: n }, () =>
    new Array<ZoneId>(n).fill(UNCLAIMED)
  );
  const frontier: Position[] = [];
  const inFrontier = new Set<string>();

  const claim = (cell: Position, zone: ZoneId): void => {
    zoneOf[cell.x][cell.y] = zone;
    for (const next of getOrthogonalNeighbors(cell, n)) {
      const key = positionToString(next);
      if (zoneOf[next.x][next.y] === UNCLAIMED && !inFrontier.has(key)) {
        inFrontier.add(key);
        frontier.push(next);
      }
    }
  };

  queens.forEach((queen, zone) => claim(queen, zone));

  while (frontier.length > 0) {
    const index = rng.nextInt(frontier.length);
    const cell = frontier[index];
    frontier[index] = frontier[frontier.length - 1];
    frontier.pop();
    inFrontier.delete(positionToString(cell));

    // A queen seed can sit in the frontier of another zone before it is popped.
    if (zoneOf[cell.x][cell.y] !== UNCLAIMED) continue;

    const owners = getOrthogonalNeighbors(cell, n)
      .map((p) => zoneOf[p.x][p.y])
      .filter((zone) => zone !== UNCLAIMED);
    claim(cell, owners[rng.nextInt(owners.length)]);
  }

  return zoneOf;
}

/**
 * Break one unwanted solution by moving one of its queen cells (never a
 * canonical one) into a neighbouring zone. The receiving zone then holds two
 * of the alternative's queens, so that placement stops being a solution,
 * while every canonical queen keeps its zone.
 *
 * A single-cell move that leaves the donor zone connected is preferred. When
 * none exists, the cell is carried out together with a path to the donor's
 * border and whatever the move cuts off from the donor's canonical queen.
 * Mutates `zoneOf`; returns false when no cell can be moved.
 */
export function repairAlternative(
  zoneOf: ZoneId[][],
  canonical: ReadonlyArray<Position>,
  alternative: ReadonlyArray<Position>,
  rng: SeededRNG
): boolean {
  const canonicalKeys = new Set(canonical.map(positionToString));
  const candidates = rng.shuffle(alternative.filter((p) => !canonicalKeys.has(positionToString(p))));

  for (const cell of candidates) {
    const donor = zoneOf[cell.x][cell.y];
    const receivers = foreignZones(zoneOf, cell, rng);
    if (receivers.length === 0 || !isZoneConnected(zoneOf, donor, cell)) {
      continue;
    }
    zoneOf[cell.x][cell.y] = receivers[0];
    return true;
  }

  for (const cell of candidates) {
    const donor = zoneOf[cell.x][cell.y];
    const seed = canonical.find((p) => zoneOf[p.x][p.y] === donor);
    if (seed && carveOut(zoneOf, cell, seed, rng)) {
      return true;
    }
  }
  return false;
}

/** Zones other than the cell's own that touch it, in random order. */
function foreignZones(
  zoneOf: ReadonlyArray<ReadonlyArray<ZoneId>>,
  cell: Position,
  rng: SeededRNG
): ZoneId[] {
  const own = zoneOf[cell.x][cell.y];
  const zones = getOrthogonalNeighbors(cell, zoneOf.length)
    .map((p) => zoneOf[p.x][p.y])
    .filter((zone) => zone !== own);
  return rng.shuffle([...new Set(zones)]);
}

/**
 * Hand `cell`, the shortest path from it to the donor's border (avoiding the
 * seed) and every donor cell no longer connected to the seed over to the
 * zone on the far side of that border. The donor keeps the seed and stays
 * connected; the receiver stays connected because every moved piece touches
 * the path.
 */
function carveOut(zoneOf: ZoneId[][], cell: Position, seed: Position, rng: SeededRNG): boolean {
  const n = zoneOf.length;
  const donor = zoneOf[cell.x][cell.y];
  const parent = new Map<string, Position | null>([[positionToString(cell), null]]);
  const queue: Position[] = [cell];
  let border: Position | null = null;

  for (let head = 0; head < queue.length; head++) {
    const current = queue[head];
    if (foreignZones(zoneOf, current, rng).length > 0) {
      border = current;
      break;
    }
    for (const next of getOrthogonalNeighbors(current, n)) {
      const key = positionToString(next);
      if (zoneOf[next.x][next.y] !== donor || parent.has(key)) continue;
      if (next.x === seed.x && next.y === seed.y) continue;
      parent.set(key, current);
      queue.push(next);
    }
  }
  if (border === null) {
    return false;
  }

  const receiver = foreignZones(zoneOf, border, rng)[0];
  for (let step: Position | null = border; step !== null; ) {
    zoneOf[step.x][step.y] = receiver;
    step = parent.get(positionToString(step)) ?? null;
  }

  // Re-attach the donor cells still reachable from the seed; the rest follow the path.
  const kept = new Set<string>([positionToString(seed)]);
  const stack: Position[] = [seed];
  for (let current = stack.pop(); current; current = stack.pop()) {
    for (const next of getOrthogonalNeighbors(current, n)) {
      const key = positionToString(next);
      if (zoneOf[next.x][next.y] === donor && !kept.has(key)) {
        kept.add(key);
        stack.push(next);
      }
    }
  }
  for (let x = 0; x < n; x++) {
    for (let y = 0; y < n; y++) {
      if (zoneOf[x][y] === donor && !kept.has(positionToString({ x, y }))) {
        zoneOf[x][y] = receiver;
      }
    }
  }
  return true;
}

/**
 * Zone map with every queen but one in a single-cell zone and the remaining
 * zone covering every other cell. Forced placements leave exactly one cell
 * for the last queen, so the canonical placement is the only solution.
 *
 * Tries each queen as the owner of the large zone, last column first, and
 * returns the first layout whose large zone is connected, or null.
 */
export function buildSingletonZones(n: number, queens: ReadonlyArray<Position>): ZoneId[][] | null {
  for (let big = queens.length - 1; big >= 0; big--) {
    const zoneOf: ZoneId[][] = Array.from({ length: n }, () => new Array<ZoneId>(n).fill(big));
    queens.forEach((queen, zone) => {
      zoneOf[queen.x][queen.y] = zone;
    });
    if (isZoneConnected(zoneOf, big)) {
      return zoneOf;
    }
  }
  return null;
}
