import {setTimeout as sleep} from 'timers/promises';
import type {Grid, ReadonlyGrid} from '../game/grid';
import {Loc} from '../game/loc';
import {type SolveSteps, SolveStepType} from '../game/solver';
import {ensureExhaustiveSwitch} from '../game/utils';
import {
  CLEAR_BELOW,
  CLUES_STYLE,
  cursorUp,
  HIDE_CURSOR,
  RESET_STYLE,
  SHOW_CURSOR,
} from './styles';

/** Anything we can write terminal output to, like `process.stdout`. */
export interface TextSink {
  write(text: string): unknown;
}

/** How many lines a rendered grid takes up. */
export const FRAME_LINES = 13;

/**
 * Renders a grid as ASCII art, with its clues in bold.
 */
export function renderFrame(grid: ReadonlyGrid): string {
  let index = 0;
  return grid.toString().replace(/[1-9.]/g, ch => {
    const loc = Loc.of(index++);
    return grid.isFixed(loc) ? `${CLUES_STYLE}${ch}${RESET_STYLE}` : ch;
  });
}

/**
 * Animates a solver run in the terminal by redrawing the grid in place after
 * each assignment.
 */
export class TerminalView {
  constructor(
    private readonly out: TextSink,
    /** How long to wait between steps, in milliseconds. */
    private readonly stepMs = 0,
  ) {}

  /**
   * Drains the given steps, drawing each one over the previous, and returns
   * the solutions they produced.  Once the run is over the frames are erased,
   * leaving the cursor where the first one started, so the caller can print
   * the outcome there.
   *
   * @param puzzle The grid the solver run started from.
   * @param steps The solver run.
   */
  async animate(puzzle: ReadonlyGrid, steps: SolveSteps): Promise<Grid[]> {
    const shown = puzzle.clone();
    let drawn = false;
    this.out.write(HIDE_CURSOR);
    try {
      for (let next = steps.next(); ; next = steps.next()) {
        if (next.done) {
          if (drawn) this.out.write(CLEAR_BELOW);
          return next.value;
        }
        const step = next.value;
        switch (step.type) {
          case SolveStepType.SET:
            shown.set(step.loc, step.num);
            break;
          case SolveStepType.CLEAR:
            shown.unset(step.loc);
            break;
          case SolveStepType.SOLUTION:
            continue;
          default:
            ensureExhaustiveSwitch(step);
        }
        this.out.write(`${renderFrame(shown)}\n${cursorUp(FRAME_LINES)}`);
        drawn = true;
        if (this.stepMs > 0) await sleep(this.stepMs);
      }
    } finally {
      this.out.write(SHOW_CURSOR);
    }
  }
}
