/**
 * ═══════════════════════════════════════════════════════════════════════════
 * Puzzle File Format (version 1)
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * Zod validation for stored puzzles. A document lists the cells of each zone
 * as `[row, col]` pairs plus, optionally, the solution:
 *
 *   { "version": 1, "size": 4, "zones": [[[0, 0], [0, 1]], ...], "solution": [[0, 1], ...] }
 *
 * Shape problems and partition problems both surface as
 * MalformedPuzzleDefinition, each with the full list of issues.
 */

import { z } from 'zod';
import { Position, PuzzleDefinition } from '../types/puzzle';
import { MalformedPuzzleDefinition, PuzzleDefinitionIssue } from '../engine/errors';
import { createPuzzleDefinition, getZoneCells } from '../puzzle/definition';
import { MAX_PUZZLE_SIZE } from '../puzzle/constants';

export const PUZZLE_FORMAT_VERSION = 1;

export const ZodCellSchema = z.tuple([z.number().int().min(0), z.number().int().min(0)]);

export const ZodPuzzleFileSchema = z.object({
  version: z.literal(PUZZLE_FORMAT_VERSION),
  size: z.number().int().min(1).max(MAX_PUZZLE_SIZE),
  zones: z.array(z.array(ZodCellSchema)),
  solution: z.array(ZodCellSchema).optional(),
});

export type PuzzleFile = z.infer<typeof ZodPuzzleFileSchema>;

function toIssues(error: z.ZodError): PuzzleDefinitionIssue[] {
  return error.issues.map((issue) => ({
    path: issue.path.join('.'),
    message: issue.message,
  }));
}

const toPosition = ([x, y]: [number, number]): Position => ({ x, y });
const toCell = (p: Position): [number, number] => [p.x, p.y];

export function validatePuzzleFile(
  data: unknown
): { success: true; data: PuzzleFile } | { success: false; issues: PuzzleDefinitionIssue[] } {
  const result = ZodPuzzleFileSchema.safeParse(data);
  if (!result.success) {
    return { success: false, issues: toIssues(result.error) };
  }
  return { success: true, data: result.data };
}

/**
 * Build a validated PuzzleDefinition from a parsed JSON document or a JSON
 * string. Throws MalformedPuzzleDefinition on any problem.
 */
export function parsePuzzle(input: unknown): PuzzleDefinition {
  let data: unknown = input;
  if (typeof input === 'string') {
    try {
      data = JSON.parse(input);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new MalformedPuzzleDefinition([{ path: '', message: `invalid JSON: ${message}` }]);
    }
  }

  const validated = validatePuzzleFile(data);
  if (!validated.success) {
    throw new MalformedPuzzleDefinition(validated.issues);
  }

  const file = validated.data;
  return createPuzzleDefinition(
    file.size,
    file.zones.map((cells) => cells.map(toPosition)),
    file.solution?.map(toPosition)
  );
}

/**
 * Version 1 document for a definition. Zone cells are listed in row-major
 * order and the solution sorted by row.
 */
export function toPuzzleFile(definition: PuzzleDefinition): PuzzleFile {
  const file: PuzzleFile = {
    version: PUZZLE_FORMAT_VERSION,
    size: definition.size,
    zones: getZoneCells(definition).map((cells) => cells.map(toCell)),
  };
  if (definition.canonicalSolution) {
    file.solution = [...definition.canonicalSolution]
      .sort((a, b) => a.x - b.x)
      .map(toCell);
  }
  return file;
}

export function serializePuzzle(definition: PuzzleDefinition): string {
  return JSON.stringify(toPuzzleFile(definition), null, 2);
}
