import { promises as fs } from 'fs';
import path from 'path';
import { PuzzleDefinition } from '../../shared/types/puzzle';
import { parsePuzzle, serializePuzzle } from '../../shared/validation/puzzleSchemas';
import {
  InvalidPuzzleIdError,
  PuzzleNotFoundError,
  PuzzleStorageError,
} from '../../shared/errors';
import { logger } from '../utils/logger';

const PUZZLE_ID_PATTERN = /^[A-Za-z0-9_-]+$/;
const PUZZLE_EXTENSION = '.json';

export interface PuzzleStore {
  save(id: string, definition: PuzzleDefinition): Promise<string>;
  load(id: string): Promise<PuzzleDefinition>;
  list(): Promise<string[]>;
}

export function isValidPuzzleId(id: string): boolean {
  return PUZZLE_ID_PATTERN.test(id);
}

function errorCode(err: unknown): string | undefined {
  if (typeof err === 'object' && err !== null && 'code' in err) {
    const code = err.code;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Puzzle store keeping one version-1 JSON document per puzzle, named
 * `<id>.json`, in a single directory.
 */
export class FilePuzzleStore implements PuzzleStore {
  constructor(private readonly dir: string) {}

  public get directory(): string {
    return this.dir;
  }

  public pathFor(id: string): string {
    if (!isValidPuzzleId(id)) {
      throw new InvalidPuzzleIdError(id);
    }
    return path.join(this.dir, `${id}${PUZZLE_EXTENSION}`);
  }

  /**
   * Write (or overwrite) a puzzle. Returns the file path.
   */
  public async save(id: string, definition: PuzzleDefinition): Promise<string> {
    const file = this.pathFor(id);
    try {
      await fs.mkdir(this.dir, { recursive: true });
      await fs.writeFile(file, `${serializePuzzle(definition)}\n`, 'utf8');
    } catch (err) {
      throw new PuzzleStorageError('save', errorMessage(err), { puzzleId: id, file });
    }
    logger.info('Puzzle saved', { puzzleId: id, size: definition.size, file });
    return file;
  }

  public async load(id: string): Promise<PuzzleDefinition> {
    const file = this.pathFor(id);
    const raw = await this.read(file, id);
    return parsePuzzle(raw);
  }

  /**
   * Load a puzzle document from an arbitrary path, outside the store.
   */
  public async loadFile(file: string): Promise<PuzzleDefinition> {
    const raw = await this.read(file, file);
    return parsePuzzle(raw);
  }

  /** Stored puzzle ids, sorted. */
  public async list(): Promise<string[]> {
    let entries: string[];
    try {
      entries = await fs.readdir(this.dir);
    } catch (err) {
      if (errorCode(err) === 'ENOENT') {
        return [];
      }
      throw new PuzzleStorageError('list', errorMessage(err), { dir: this.dir });
    }
    return entries
      .filter((name) => name.endsWith(PUZZLE_EXTENSION))
      .map((name) => name.slice(0, -PUZZLE_EXTENSION.length))
      .filter(isValidPuzzleId)
      .sort();
  }

  private async read(file: string, puzzleId: string): Promise<string> {
    try {
      return await fs.readFile(file, 'utf8');
    } catch (err) {
      if (errorCode(err) === 'ENOENT') {
        throw new PuzzleNotFoundError(puzzleId, { file });
      }
      throw new PuzzleStorageError('load', errorMessage(err), { puzzleId, file });
    }
  }
}
