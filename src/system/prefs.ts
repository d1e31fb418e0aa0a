import * as path from 'path';

/** Where the bundled puzzle collection lives. */
export const DEFAULT_PUZZLES_FILE = path.resolve(
  __dirname,
  '../../data/puzzles.json',
);

let stepMs = 0;
let maxSolutions = 1;
let puzzlesFile = DEFAULT_PUZZLES_FILE;
let logEvents = false;

/**
 * Reads the preferences from the given environment, falling back to the
 * defaults for anything missing or malformed.  Called once when this module
 * loads.
 */
export function loadPrefs(env: NodeJS.ProcessEnv = process.env) {
  stepMs = 0;
  {
    const stored = Number(env['SUDOKU_STEP_MS']);
    if (Number.isInteger(stored) && stored >= 0) stepMs = stored;
  }

  maxSolutions = 1;
  {
    const stored = env['SUDOKU_MAX_SOLUTIONS'];
    if (stored && /^\d+$/.test(stored)) maxSolutions = Number(stored);
  }

  puzzlesFile = env['SUDOKU_PUZZLES_FILE'] || DEFAULT_PUZZLES_FILE;
  logEvents = env['SUDOKU_LOG_EVENTS'] === 'true';
}
loadPrefs();

/** Returns how many milliseconds the terminal view waits between steps. */
export function getStepMs(): number {
  return stepMs;
}

export function setStepMs(ms: number) {
  stepMs = ms;
}

/** Returns how many solutions to look for; 0 means all of them. */
export function getMaxSolutions(): number {
  return maxSolutions;
}

export function setMaxSolutions(count: number) {
  maxSolutions = count;
}

/** Returns the path of the JSON file that maps puzzle IDs to clues. */
export function getPuzzlesFile(): string {
  return puzzlesFile;
}

export function setPuzzlesFile(file: string) {
  puzzlesFile = file;
}

/** Tells whether the default event sink writes events to stderr. */
export function getLogEvents(): boolean {
  return logEvents;
}

export function setLogEvents(flag: boolean) {
  logEvents = flag;
}
