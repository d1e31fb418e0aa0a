import {performance} from 'perf_hooks';
import {EventType, logEvent} from '../system/analytics';
import {ConstraintViolationError, InvalidInputError} from './errors';
import {Grid, numsOfMask, type ReadonlyGrid} from './grid';
import {checkInt} from './ints';
import {Loc} from './loc';

export enum SolveStepType {
  /** The solver assigned a numeral to a location. */
  SET = 'set',
  /** The solver cleared a location it had assigned earlier. */
  CLEAR = 'clear',
  /** The solver recorded a solution. */
  SOLUTION = 'solution',
}

export interface SetStep {
  readonly type: SolveStepType.SET;
  readonly loc: Loc;
  readonly num: number;
}

export interface ClearStep {
  readonly type: SolveStepType.CLEAR;
  readonly loc: Loc;
}

export interface SolutionStep {
  readonly type: SolveStepType.SOLUTION;
  /** A snapshot of the solved grid, the same object `solve` returns. */
  readonly solution: ReadonlyGrid;
  /** The solution's position in the results, counting from 0. */
  readonly index: number;
}

/** One observable event of a solver run. */
export type SolveStep = SetStep | ClearStep | SolutionStep;

/**
 * The lazy sequence of a solver run's steps.  Its return value is the list of
 * solutions found.
 */
export type SolveSteps = Generator<SolveStep, Grid[], undefined>;

export interface SolverOptions {
  /**
   * How many solutions to look for before stopping; 0 means all of them.
   * Defaults to 1.
   */
  readonly maxSolutions?: number;
}

/**
 * Solves Sudoku grids by propagating naked singles, then trying each
 * candidate of the location with the fewest candidates.
 */
export class Solver {
  readonly maxSolutions: number;

  /**
   * @throws InvalidInputError if `maxSolutions` is not a non-negative integer.
   */
  constructor({maxSolutions = 1}: SolverOptions = {}) {
    if (checkInt(maxSolutions) < 0) {
      throw new InvalidInputError(`Negative solution limit ${maxSolutions}`);
    }
    this.maxSolutions = maxSolutions;
  }

  /**
   * Returns the grid's solutions, up to `maxSolutions` of them, in the order
   * the search finds them.  The given grid is not modified.
   */
  solve(grid: ReadonlyGrid): Grid[] {
    const steps = this.steps(grid);
    let next = steps.next();
    while (!next.done) next = steps.next();
    return next.value;
  }

  /**
   * Starts a solver run that pauses after every step.  The given grid is not
   * modified; abandoning the generator abandons the search.
   */
  *steps(grid: ReadonlyGrid): SolveSteps {
    const startTimeMs = performance.now();
    const search = new Search(grid.clone(), this.maxSolutions);
    if (!grid.isValid()) {
      logEvent(EventType.SYSTEM, {
        category: 'conflicting clues',
        detail: grid.toFlatString(),
      });
      return search.solutions;
    }
    yield* search.explore();
    logEvent(EventType.SYSTEM, {
      category: 'solve time',
      detail: `${search.solutions.length} solution(s) for ${grid.toFlatString()}`,
      elapsedMs: performance.now() - startTimeMs,
    });
    return search.solutions;
  }
}

/**
 * The state of one solver run, which owns its working grid.
 */
class Search {
  readonly solutions: Grid[] = [];

  constructor(
    private readonly grid: Grid,
    private readonly maxSolutions: number,
  ) {}

  /** Tells whether we have found as many solutions as we were asked for. */
  get finished(): boolean {
    return (
      this.maxSolutions > 0 && this.solutions.length >= this.maxSolutions
    );
  }

  /**
   * Searches the subtree rooted at the grid's current state.  Unless the
   * search is finished, the grid is back in that state on return.
   */
  *explore(): Generator<SolveStep, void, undefined> {
    const forced: Loc[] = [];
    if (yield* this.propagate(forced)) {
      const loc = this.mostConstrainedLoc();
      if (!loc) {
        const solution = this.grid.clone();
        this.solutions.push(solution);
        yield {
          type: SolveStepType.SOLUTION,
          solution,
          index: this.solutions.length - 1,
        };
      } else {
        for (const num of numsOfMask(this.grid.candidateMask(loc))) {
          if (!(yield* this.trySet(loc, num))) continue;
          yield* this.explore();
          if (this.finished) return;
          yield* this.clear(loc);
        }
      }
    }
    if (this.finished) return;
    for (const loc of forced.reverse()) {
      yield* this.clear(loc);
    }
  }

  /**
   * Assigns every naked single until there are none left, recording the
   * assigned locations in `forced`.  Returns false if some blank location has
   * no candidates.
   */
  private *propagate(forced: Loc[]): Generator<SolveStep, boolean, undefined> {
    let changed = true;
    while (changed) {
      changed = false;
      for (const loc of Loc.ALL) {
        if (this.grid.get(loc)) continue;
        const mask = this.grid.candidateMask(loc);
        if (!mask) return false;
        if (mask & (mask - 1)) continue; // more than one candidate
        const [num] = numsOfMask(mask);
        this.grid.set(loc, num);
        forced.push(loc);
        yield {type: SolveStepType.SET, loc, num};
        changed = true;
      }
    }
    return true;
  }

  /**
   * Returns the blank location with the fewest candidates, the earliest in
   * row-major order among equals, or null if the grid is full.
   */
  private mostConstrainedLoc(): Loc | null {
    let best: Loc | null = null;
    let bestCount = 10;
    for (const loc of Loc.ALL) {
      if (this.grid.get(loc)) continue;
      const count = this.grid.candidateCount(loc);
      if (count < bestCount) {
        best = loc;
        bestCount = count;
        // After propagation no blank location has fewer than 2.
        if (count <= 2) break;
      }
    }
    return best;
  }

  /**
   * Tentatively assigns a numeral, and tells whether it could be assigned.
   */
  private *trySet(
    loc: Loc,
    num: number,
  ): Generator<SolveStep, boolean, undefined> {
    try {
      this.grid.set(loc, num);
    } catch (e: unknown) {
      if (e instanceof ConstraintViolationError) return false;
      throw e;
    }
    yield {type: SolveStepType.SET, loc, num};
    return true;
  }

  private *clear(loc: Loc): Generator<SolveStep, void, undefined> {
    this.grid.unset(loc);
    yield {type: SolveStepType.CLEAR, loc};
  }
}

/**
 * Returns up to `maxSolutions` solutions of the given grid; 0 means all.
 */
export function solve(grid: ReadonlyGrid, maxSolutions = 1): Grid[] {
  return new Solver({maxSolutions}).solve(grid);
}

/**
 * Counts the grid's solutions, stopping once `limit` are found; 0 means no
 * limit.
 */
export function countSolutions(grid: ReadonlyGrid, limit = 0): number {
  return solve(grid, limit).length;
}
