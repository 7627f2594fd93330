import type { BoardState, CellMark, PuzzleDefinition, ZoneId } from '../../shared/types/puzzle';

/**
 * Plain-text board view for terminals and logs.
 *
 * Each zone gets a letter. Empty cells show it in lower case, queens in
 * upper case, crosses as `*`.
 */

/** A–Z, then Greek capitals that do not look like Latin ones. */
export const DEFAULT_ZONE_LABELS: readonly string[] = [
  ...'ABCDEFGHIJKLMNOPQRSTUVWXYZ',
  ...'ΓΔΘΛΞΠ',
];

export const CROSS_SYMBOL = '*';

export interface RenderOptions {
  /** Label per ZoneId; single characters with distinct cases read best. */
  labels?: ReadonlyArray<string>;
  /** Prefix rows and columns with their indices. */
  showCoordinates?: boolean;
}

export function zoneLabel(zone: ZoneId, labels: ReadonlyArray<string> = DEFAULT_ZONE_LABELS): string {
  return labels[zone] ?? '?';
}

function renderCell(mark: CellMark, label: string): string {
  switch (mark) {
    case 'queen':
      return label.toUpperCase();
    case 'cross':
      return CROSS_SYMBOL;
    default:
      return label.toLowerCase();
  }
}

/**
 * Render the board, one line per row. Without a board state every cell is
 * drawn empty, which shows the zone layout alone.
 */
export function renderBoard(
  definition: PuzzleDefinition,
  board?: Pick<BoardState, 'cells'>,
  options: RenderOptions = {}
): string {
  const labels = options.labels ?? DEFAULT_ZONE_LABELS;
  const width = String(definition.size - 1).length;
  const lines: string[] = [];

  if (options.showCoordinates) {
    const header = Array.from({ length: definition.size }, (_, y) => String(y % 10)).join(' ');
    lines.push(`${' '.repeat(width)} ${header}`);
  }

  definition.zoneOf.forEach((row, x) => {
    const cells = row
      .map((zone, y) => renderCell(board ? board.cells[x][y] : 'empty', zoneLabel(zone, labels)))
      .join(' ');
    lines.push(options.showCoordinates ? `${String(x).padStart(width)} ${cells}` : cells);
  });

  return lines.join('\n');
}

/**
 * Render the zones with the canonical solution's queens filled in.
 */
export function renderSolution(definition: PuzzleDefinition, options: RenderOptions = {}): string {
  const cells: CellMark[][] = definition.zoneOf.map((row) => row.map((): CellMark => 'empty'));
  for (const queen of definition.canonicalSolution ?? []) {
    cells[queen.x][queen.y] = 'queen';
  }
  return renderBoard(definition, { cells }, options);
}
