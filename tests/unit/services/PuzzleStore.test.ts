import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';

import { FilePuzzleStore, isValidPuzzleId } from '../../../src/server/storage/PuzzleStore';
import {
  InvalidPuzzleIdError,
  PuzzleErrorCode,
  PuzzleNotFoundError,
  PuzzleStorageError,
} from '../../../src/shared/errors';
import { MalformedPuzzleDefinition } from '../../../src/shared/engine/errors';
import { createScenario4, puzzleFixturePath } from '../../utils/fixtures';

describe('FilePuzzleStore', () => {
  let tmpDir: string;
  let store: FilePuzzleStore;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'queens-store-'));
    store = new FilePuzzleStore(path.join(tmpDir, 'puzzles'));
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  describe('isValidPuzzleId', () => {
    it('accepts letters, digits, underscores and dashes', () => {
      expect(isValidPuzzleId('daily_8-2024')).toBe(true);
    });

    it('rejects ids that could leave the directory', () => {
      expect(isValidPuzzleId('')).toBe(false);
      expect(isValidPuzzleId('../secret')).toBe(false);
      expect(isValidPuzzleId('a/b')).toBe(false);
      expect(isValidPuzzleId('a.json')).toBe(false);
    });
  });

  it('creates the directory on first save and reads the puzzle back', async () => {
    const definition = createScenario4();

    const file = await store.save('walkthrough', definition);

    expect(file).toBe(path.join(tmpDir, 'puzzles', 'walkthrough.json'));
    expect(await store.load('walkthrough')).toEqual(definition);
  });

  it('writes the version-1 document with a trailing newline', async () => {
    const file = await store.save('walkthrough', createScenario4());
    const text = await fs.readFile(file, 'utf8');

    expect(text.endsWith('}\n')).toBe(true);
    expect(JSON.parse(text)).toEqual(
      JSON.parse(await fs.readFile(puzzleFixturePath('scenario-4.json'), 'utf8'))
    );
  });

  it('overwrites an existing puzzle', async () => {
    await store.save('p', createScenario4());
    await store.save('p', createScenario4(false));
    expect((await store.load('p')).canonicalSolution).toBeUndefined();
  });

  it('lists stored ids in order and ignores other files', async () => {
    await store.save('b-puzzle', createScenario4());
    await store.save('a-puzzle', createScenario4());
    await fs.writeFile(path.join(store.directory, 'notes.txt'), 'hello', 'utf8');
    await fs.writeFile(path.join(store.directory, 'bad name.json'), '{}', 'utf8');

    expect(await store.list()).toEqual(['a-puzzle', 'b-puzzle']);
  });

  it('lists nothing when the directory does not exist', async () => {
    expect(await store.list()).toEqual([]);
  });

  it('reports a missing puzzle as PuzzleNotFoundError', async () => {
    await expect(store.load('nope')).rejects.toBeInstanceOf(PuzzleNotFoundError);
    await expect(store.load('nope')).rejects.toMatchObject({
      code: PuzzleErrorCode.PUZZLE_NOT_FOUND,
      message: 'Puzzle not found: nope',
    });
  });

  it('rejects invalid ids before touching the disk', async () => {
    await expect(store.save('../escape', createScenario4())).rejects.toBeInstanceOf(
      InvalidPuzzleIdError
    );
    await expect(store.load('a/b')).rejects.toBeInstanceOf(InvalidPuzzleIdError);
    expect(await store.list()).toEqual([]);
  });

  it('reports a corrupt document as MalformedPuzzleDefinition', async () => {
    await fs.mkdir(store.directory, { recursive: true });
    await fs.writeFile(path.join(store.directory, 'broken.json'), '{ not json', 'utf8');

    await expect(store.load('broken')).rejects.toBeInstanceOf(MalformedPuzzleDefinition);
  });

  it('wraps other I/O failures in PuzzleStorageError', async () => {
    // A file where the directory should be makes mkdir fail.
    const blocked = path.join(tmpDir, 'blocked');
    await fs.writeFile(blocked, 'x', 'utf8');
    const blockedStore = new FilePuzzleStore(blocked);

    await expect(blockedStore.save('p', createScenario4())).rejects.toBeInstanceOf(
      PuzzleStorageError
    );
  });

  describe('loadFile', () => {
    it('loads a document from any path', async () => {
      const definition = await store.loadFile(puzzleFixturePath('scenario-4.json'));
      expect(definition).toEqual(createScenario4());
    });

    it('names the path when the file is missing', async () => {
      const missing = path.join(tmpDir, 'missing.json');
      await expect(store.loadFile(missing)).rejects.toMatchObject({
        message: `Puzzle not found: ${missing}`,
      });
    });
  });
});
