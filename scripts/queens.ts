#!/usr/bin/env node
/**
 * Command-line front end for the Queens puzzle engine.
 *
 * Commands:
 * - generate: build a puzzle with a unique solution and store it.
 * - show: print a puzzle's zones, optionally with its solution.
 * - verify: check a stored puzzle's invariants and solution uniqueness.
 * - play: line-based play session on a terminal.
 *
 * Usage (from repo root):
 *
 *   npx ts-node scripts/queens.ts generate --size 8 --seed 42 --id daily
 *   npx ts-node scripts/queens.ts show --game daily --solution
 *   npx ts-node scripts/queens.ts verify --game ./puzzles/daily.json
 *   npx ts-node scripts/queens.ts play --game daily
 *
 * `--game` takes a store id or a path to a puzzle file (anything containing
 * a path separator or ending in .json).
 */

import * as path from 'path';
import * as readline from 'readline';

import { RuleEngine } from '../src/shared/engine/RuleEngine';
import type { PuzzleDefinition } from '../src/shared/types/puzzle';
import { isEngineError } from '../src/shared/engine/errors';
import { PuzzleErrorCode, getExitCode, wrapError } from '../src/shared/errors';
import { handleCellClick } from '../src/client/adapters/boardInteraction';
import { renderBoard, renderSolution } from '../src/client/adapters/textBoardRenderer';
import { config } from '../src/server/config';
import { logger } from '../src/server/utils/logger';
import { FilePuzzleStore } from '../src/server/storage/PuzzleStore';
import { PuzzleGenerationService } from '../src/server/services/PuzzleGenerationService';

// ═══════════════════════════════════════════════════════════════════════════
// Argument parsing
// ═══════════════════════════════════════════════════════════════════════════

interface GenerateCliArgs {
  command: 'generate';
  size?: number;
  seed?: number;
  id?: string;
}

interface ShowCliArgs {
  command: 'show';
  game: string;
  solution: boolean;
}

interface VerifyCliArgs {
  command: 'verify';
  game: string;
}

interface PlayCliArgs {
  command: 'play';
  game: string;
}

export type CliArgs = GenerateCliArgs | ShowCliArgs | VerifyCliArgs | PlayCliArgs;

function printUsage(): void {
  console.error(
    [
      'Usage:',
      '  queens generate [--size N] [--seed S] [--id ID]',
      '  queens show --game <id|path> [--solution]',
      '  queens verify --game <id|path>',
      '  queens play --game <id|path>',
    ].join('\n')
  );
}

function parseNonNegativeInt(flag: string, raw: string): number | null {
  const parsed = Number(raw);
  if (!Number.isInteger(parsed) || parsed < 0) {
    console.error(`Invalid ${flag} value: ${raw}`);
    return null;
  }
  return parsed;
}

/**
 * Parse CLI arguments. Returns null (after printing the problem) when they
 * do not form a valid command.
 */
export function parseArgs(argv: string[]): CliArgs | null {
  const [command, ...rest] = argv;
  let size: number | undefined;
  let seed: number | undefined;
  let id: string | undefined;
  let game = '';
  let solution = false;

  for (let i = 0; i < rest.length; i += 1) {
    const arg = rest[i];

    if (arg === '--size' && rest[i + 1]) {
      const parsed = parseNonNegativeInt('--size', rest[i + 1]);
      if (parsed === null) return null;
      size = parsed;
      i += 1;
    } else if (arg === '--seed' && rest[i + 1]) {
      const parsed = parseNonNegativeInt('--seed', rest[i + 1]);
      if (parsed === null) return null;
      seed = parsed;
      i += 1;
    } else if (arg === '--id' && rest[i + 1]) {
      id = rest[i + 1];
      i += 1;
    } else if (arg === '--game' && rest[i + 1]) {
      game = rest[i + 1];
      i += 1;
    } else if (arg === '--solution') {
      solution = true;
    } else {
      console.error(`Unknown argument: ${arg}`);
      return null;
    }
  }

  switch (command) {
    case 'generate':
      return {
        command: 'generate',
        ...(size !== undefined && { size }),
        ...(seed !== undefined && { seed }),
        ...(id !== undefined && { id }),
      };
    case 'show':
    case 'verify':
    case 'play':
      if (!game) {
        console.error(`Missing required --game for ${command}`);
        return null;
      }
      return command === 'show' ? { command, game, solution } : { command, game };
    default:
      console.error(command ? `Unknown command: ${command}` : 'Missing command');
      return null;
  }
}

/**
 * Distinguish a puzzle file path from a store id.
 */
export function isPuzzlePath(ref: string): boolean {
  return ref.includes('/') || ref.includes(path.sep) || ref.endsWith('.json');
}

// ═══════════════════════════════════════════════════════════════════════════
// Play session
// ═══════════════════════════════════════════════════════════════════════════

export type PlayCommand =
  | { kind: 'queen'; x: number; y: number }
  | { kind: 'cross'; x: number; y: number }
  | { kind: 'show' }
  | { kind: 'reset' }
  | { kind: 'help' }
  | { kind: 'quit' };

const PLAY_HELP = [
  'Commands:',
  '  q <row> <col>   place or remove a queen',
  '  x <row> <col>   toggle a cross',
  '  show            print the board',
  '  reset           clear the board',
  '  quit            leave the session',
].join('\n');

/**
 * Parse one line typed during a play session. Rows and columns are 0-based.
 */
export function parsePlayCommand(line: string): PlayCommand | null {
  const parts = line.trim().split(/\s+/);
  const verb = parts[0]?.toLowerCase() ?? '';

  if (verb === 'q' || verb === 'x') {
    if (parts.length !== 3 || !/^\d+$/.test(parts[1]) || !/^\d+$/.test(parts[2])) {
      return null;
    }
    const x = Number(parts[1]);
    const y = Number(parts[2]);
    return verb === 'q' ? { kind: 'queen', x, y } : { kind: 'cross', x, y };
  }
  if (parts.length !== 1) {
    return null;
  }
  switch (verb) {
    case 'show':
    case 'reset':
    case 'help':
    case 'quit':
      return { kind: verb };
    default:
      return null;
  }
}

/** Elapsed time as MM:SS. */
export function formatElapsed(ms: number): string {
  const totalSeconds = Math.floor(ms / 1000);
  const minutes = Math.floor(totalSeconds / 60);
  const seconds = totalSeconds % 60;
  return `${String(minutes).padStart(2, '0')}:${String(seconds).padStart(2, '0')}`;
}

export interface PlayStepResult {
  lines: string[];
  done: boolean;
}

/**
 * Apply one play command to the engine and return what to print.
 */
export function executePlayCommand(
  engine: RuleEngine,
  command: PlayCommand,
  elapsedMs: number
): PlayStepResult {
  const board = (): string =>
    renderBoard(engine.getDefinition(), engine.getBoardState(), { showCoordinates: true });

  switch (command.kind) {
    case 'show':
      return { lines: [board()], done: false };
    case 'help':
      return { lines: [PLAY_HELP], done: false };
    case 'reset':
      engine.reset();
      return { lines: [board()], done: false };
    case 'quit':
      return { lines: ['Bye.'], done: true };
    case 'queen':
    case 'cross': {
      const position = { x: command.x, y: command.y };
      const { outcome, messages } = handleCellClick(
        engine,
        position,
        command.kind === 'queen' ? 'primary' : 'secondary'
      );
      if (!outcome.valid) {
        return { lines: messages, done: false };
      }
      if (outcome.data.solved) {
        return { lines: [board(), `Solved in ${formatElapsed(elapsedMs)}!`], done: true };
      }
      return { lines: [board()], done: false };
    }
  }
}

function runPlaySession(definition: PuzzleDefinition): Promise<void> {
  const engine = new RuleEngine(definition);
  const startTime = Date.now();
  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });

  console.log(renderBoard(definition, engine.getBoardState(), { showCoordinates: true }));
  console.log('Type "help" for commands.');
  rl.setPrompt('> ');
  rl.prompt();

  return new Promise((resolve) => {
    rl.on('line', (line) => {
      const command = parsePlayCommand(line);
      if (!command) {
        console.log('Unrecognised command. Type "help" for commands.');
        rl.prompt();
        return;
      }
      const step = executePlayCommand(engine, command, Date.now() - startTime);
      for (const out of step.lines) {
        console.log(out);
      }
      if (step.done) {
        rl.close();
        return;
      }
      rl.prompt();
    });
    rl.on('close', () => resolve());
  });
}

// ═══════════════════════════════════════════════════════════════════════════
// Entry point
// ═══════════════════════════════════════════════════════════════════════════

async function loadPuzzle(store: FilePuzzleStore, ref: string): Promise<PuzzleDefinition> {
  return isPuzzlePath(ref) ? store.loadFile(path.resolve(ref)) : store.load(ref);
}

async function run(args: CliArgs): Promise<number> {
  const store = new FilePuzzleStore(config.puzzles.dir);
  const service = new PuzzleGenerationService(store);

  switch (args.command) {
    case 'generate': {
      const record = await service.generate(args);
      console.log(renderBoard(record.definition));
      console.log(`Saved ${record.id} to ${record.file}`);
      return 0;
    }
    case 'show': {
      const definition = await loadPuzzle(store, args.game);
      console.log(args.solution ? renderSolution(definition) : renderBoard(definition));
      if (args.solution && !definition.canonicalSolution) {
        console.log('(no stored solution)');
      }
      return 0;
    }
    case 'verify': {
      const definition = await loadPuzzle(store, args.game);
      const report = service.verify(definition);
      if (!report.valid) {
        for (const issue of report.issues) {
          console.log(`invalid: ${issue.path}: ${issue.message}`);
        }
        return 2;
      }
      const count = report.solutionCount === 2 ? 'at least 2' : String(report.solutionCount);
      console.log(`solutions: ${count}`);
      console.log(`unique: ${report.unique ? 'yes' : 'no'}`);
      if (report.matchesStoredSolution !== null) {
        console.log(`stored solution confirmed: ${report.matchesStoredSolution ? 'yes' : 'no'}`);
      }
      return report.unique && report.matchesStoredSolution !== false ? 0 : 1;
    }
    case 'play': {
      const definition = await loadPuzzle(store, args.game);
      await runPlaySession(definition);
      return 0;
    }
  }
}

/**
 * Print a failed command's error and pick the exit status. Engine errors
 * (malformed puzzles, bad coordinates) are usage problems; everything else
 * maps through the puzzle error codes, unknown failures as INTERNAL_ERROR.
 */
export function reportFailure(err: unknown, command: CliArgs['command']): number {
  if (isEngineError(err)) {
    console.error(`${err.code}: ${err.message}`);
    return 2;
  }

  const failure = wrapError(err, { command });
  if (failure.code === PuzzleErrorCode.INTERNAL_ERROR) {
    logger.error('Unexpected failure', failure.toJSON());
  }
  console.error(`${failure.code}: ${failure.message}`);
  return getExitCode(failure);
}

async function main(argv: string[] = process.argv.slice(2)): Promise<number> {
  const args = parseArgs(argv);
  if (!args) {
    printUsage();
    return 2;
  }

  try {
    return await run(args);
  } catch (err) {
    return reportFailure(err, args.command);
  }
}

if (require.main === module) {
  main().then((code) => {
    process.exitCode = code;
  });
}
