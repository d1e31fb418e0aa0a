import {parseArgs} from 'util';
import {InvalidInputError, SudokuError} from '../game/errors';
import type {Grid} from '../game/grid';
import {checkInt} from '../game/ints';
import {parseGrid} from '../game/parse';
import {Solver} from '../game/solver';
import {ensureExhaustiveSwitch} from '../game/utils';
import {EventType, logEvent} from '../system/analytics';
import {getMaxSolutions, getStepMs} from '../system/prefs';
import {readTextFile} from '../system/files';
import {defaultPuzzleService} from '../system/puzzle-service';
import {CORRECT_COLOR, ERROR_COLOR, RESET_STYLE} from './styles';
import {renderFrame, TerminalView, type TextSink} from './terminal-view';

/** The puzzle we solve when not told which one to solve. */
export const DEFAULT_PUZZLE =
  'xxxxxxx9xx9x7xx21xxx4x9xxxxx1xxx8xxx7xx42xxx5xx8xxxx748x1xxxx4xxxxxxxxxxxx9613xxx';

export const USAGE = `Usage: sudoku [options]

Options:
  -s, --step <ms>   Wait this many milliseconds between steps
  -q, --quiet       No animation, just print the solutions
  -m, --max <n>     Find up to this many solutions, 0 for all of them
  -f, --file <path> Load the puzzle from a file
  -i, --id <id>     Load the puzzle with this ID from the puzzle collection
  -h, --help        Show this message
`;

/** Where the puzzle comes from. */
export type PuzzleSource =
  | {readonly kind: 'default'}
  | {readonly kind: 'file'; readonly path: string}
  | {readonly kind: 'id'; readonly puzzleId: string};

export interface CommandLine {
  readonly help: boolean;
  readonly quiet: boolean;
  readonly stepMs: number;
  readonly maxSolutions: number;
  readonly source: PuzzleSource;
}

/** The terminal streams the command writes to. */
export interface Io {
  readonly out: TextSink;
  readonly err: TextSink;
}

function checkCount(flag: string, text: string): number {
  if (!/^\d+$/.test(text)) {
    throw new InvalidInputError(`--${flag} needs a non-negative integer`);
  }
  return checkInt(Number(text));
}

function parseFlags(argv: readonly string[]) {
  try {
    return parseArgs({
      args: [...argv],
      options: {
        step: {type: 'string', short: 's'},
        quiet: {type: 'boolean', short: 'q'},
        max: {type: 'string', short: 'm'},
        file: {type: 'string', short: 'f'},
        id: {type: 'string', short: 'i'},
        help: {type: 'boolean', short: 'h'},
      },
    }).values;
  } catch (e: unknown) {
    throw new InvalidInputError(e instanceof Error ? e.message : String(e));
  }
}

/**
 * Parses command line arguments, with the prefs supplying the defaults.
 *
 * @throws InvalidInputError if the arguments are malformed.
 */
export function parseCommandLine(argv: readonly string[]): CommandLine {
  const values = parseFlags(argv);
  if (values.file !== undefined && values.id !== undefined) {
    throw new InvalidInputError('Give either --file or --id, not both');
  }
  const source: PuzzleSource =
    values.file !== undefined
      ? {kind: 'file', path: values.file}
      : values.id !== undefined
      ? {kind: 'id', puzzleId: values.id}
      : {kind: 'default'};
  return {
    help: values.help ?? false,
    quiet: values.quiet ?? false,
    stepMs:
      values.step === undefined ? getStepMs() : checkCount('step', values.step),
    maxSolutions:
      values.max === undefined
        ? getMaxSolutions()
        : checkCount('max', values.max),
    source,
  };
}

async function loadPuzzle(source: PuzzleSource): Promise<Grid> {
  switch (source.kind) {
    case 'default':
      return parseGrid(DEFAULT_PUZZLE);
    case 'file':
      return parseGrid(await readTextFile(source.path));
    case 'id':
      return defaultPuzzleService().loadById(source.puzzleId);
    default:
      return ensureExhaustiveSwitch(source);
  }
}

/**
 * Runs the command: prints the puzzle, solves it (animating unless told to
 * be quiet), and prints the solutions.
 *
 * @returns The process exit code: 0 if solved, 1 if there is no solution, 2
 *     if the input was bad.
 */
export async function main(
  argv: readonly string[],
  io: Io = {out: process.stdout, err: process.stderr},
): Promise<number> {
  const {out} = io;
  let commandLine: CommandLine;
  let puzzle: Grid;
  try {
    commandLine = parseCommandLine(argv);
    if (commandLine.help) {
      out.write(USAGE);
      return 0;
    }
    puzzle = await loadPuzzle(commandLine.source);
  } catch (e: unknown) {
    if (!(e instanceof SudokuError)) throw e;
    io.err.write(`${e.kind}: ${e.message}\n${USAGE}`);
    return 2;
  }
  logEvent(EventType.ACTION, {
    category: 'solve requested',
    detail: puzzle.toFlatString(),
  });

  out.write(`${renderFrame(puzzle)}\n`);
  out.write(`${ERROR_COLOR}        Solving...${RESET_STYLE}\n`);
  const solver = new Solver({maxSolutions: commandLine.maxSolutions});
  const solutions = commandLine.quiet
    ? solver.solve(puzzle)
    : await new TerminalView(out, commandLine.stepMs).animate(
        puzzle,
        solver.steps(puzzle),
      );

  if (!solutions.length) {
    out.write(`${ERROR_COLOR}    No solution found${RESET_STYLE}\n`);
    return 1;
  }
  solutions.forEach((solution, i) => {
    if (solutions.length > 1) out.write(`Solution ${i + 1}:\n`);
    out.write(`${renderFrame(solution)}\n`);
  });
  out.write(`${CORRECT_COLOR}          Done!${RESET_STYLE}\n`);
  return 0;
}
