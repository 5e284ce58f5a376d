/**
 * Timetable CSP - Backtracking Search Engine
 *
 * Strategy:
 * 1. MRV: at every decision point pick the unassigned lecture with the fewest
 *    values still consistent with the current partial assignment
 *    (ties: first in lecture order)
 * 2. RANDOMIZED VALUE ORDER: the chosen lecture's domain is shuffled, then tried in order
 * 3. CHRONOLOGICAL BACKTRACKING: commit, recurse, undo on failure
 * 4. WALL-CLOCK BUDGET: checked at every step; running out is a result, not an error
 *
 * Sound (every solved assignment passes findAllConflicts) but not complete
 * under a timeout: 'timed-out' and 'exhausted' both mean "no usable result".
 *
 * The assignment state belongs to the solver instance. Use one instance per
 * concurrent solve; lectures and domains may be shared.
 */

import { resolveSolverConfig, type SolverConfig } from './config';
import { isConsistent } from './constraints';
import { InvalidSolverInputError } from './errors';
import {
  indexLectures,
  lectureKey,
  type Assignment,
  type Domains,
  type Lecture,
  type LectureIndex,
  type ReadonlyAssignment,
  type SlotAssignment,
} from './models';
import { createRandom, shuffle, type RandomSource } from './random';

export type SolveStatus = 'searching' | 'solved' | 'timed-out' | 'exhausted';

export interface SolveStats {
  totalVariables: number;
  bestAssignedCount: number; // Largest partial assignment reached
  iterations: number;
  elapsedMs: number;
}

export type SolveResult =
  | (SolveStats & { status: 'solved'; assignment: Assignment })
  | (SolveStats & { status: 'timed-out' | 'exhausted' });

export interface SolveProgress {
  assigned: number;
  total: number;
  iterations: number;
}

export interface SolverOptions extends Partial<SolverConfig> {
  /** Overrides `seed` when given */
  random?: RandomSource;
  /** Called every `progressInterval` decision steps; must not touch the solver */
  onProgress?: (progress: SolveProgress) => void;
  /** Monotonic milliseconds, defaults to performance.now */
  clock?: () => number;
}

export interface SolutionStatistics {
  totalAssigned: number;
  timeslotUsage: Record<string, number>;
  instructorLoad: Record<string, number>;
  roomUsage: Record<string, number>;
}

interface VariableChoice {
  lecture: Lecture;
  remaining: number;
}

export class TimetableSolver {
  private readonly lectureIndex: LectureIndex;
  private readonly config: SolverConfig;
  private readonly random: RandomSource;
  private readonly clock: () => number;
  private readonly onProgress?: (progress: SolveProgress) => void;

  // Search state (single mutable structure, reset per solve)
  private assignment: Assignment = new Map();
  private status: SolveStatus = 'searching';
  private iterations = 0;
  private bestAssignedCount = 0;
  private startTime = 0;
  private timeoutMs = 0;

  constructor(
    private readonly lectures: readonly Lecture[],
    private readonly domains: Domains,
    options: SolverOptions = {}
  ) {
    if (lectures.length === 0) {
      throw new InvalidSolverInputError('Cannot solve an empty set of lectures');
    }

    this.lectureIndex = indexLectures(lectures);
    if (this.lectureIndex.size !== lectures.length) {
      throw new InvalidSolverInputError('Lecture identity keys must be unique');
    }

    const { random, onProgress, clock, ...overrides } = options;
    this.config = resolveSolverConfig(overrides);
    this.random = random ?? createRandom(this.config.seed);
    this.clock = clock ?? (() => performance.now());
    this.onProgress = onProgress;
  }

  getStatus(): SolveStatus {
    return this.status;
  }

  /**
   * Current (partial) assignment; a copy, so callers cannot disturb the search
   */
  getAssignment(): Assignment {
    return new Map(this.assignment);
  }

  solve(timeoutSeconds: number = this.config.timeoutSeconds): SolveResult {
    if (!Number.isFinite(timeoutSeconds) || timeoutSeconds < 0) {
      throw new InvalidSolverInputError(`timeoutSeconds must be a non-negative number, got ${timeoutSeconds}`);
    }

    console.log(`🚀 Starting CSP Solver: ${this.lectures.length} lectures, timeout ${timeoutSeconds}s`);

    this.assignment = new Map();
    this.status = 'searching';
    this.iterations = 0;
    this.bestAssignedCount = 0;
    this.timeoutMs = timeoutSeconds * 1000;
    this.startTime = this.clock();

    // Empty domain: infeasible as posed, no search budget spent
    const emptyDomain = this.lectures.find((lecture) => this.domainOf(lecture).length === 0);
    if (emptyDomain) {
      console.log(`❌ ${lectureKey(emptyDomain)} has an empty domain - no solution possible`);
      this.status = 'exhausted';
      return this.result();
    }

    const solved = this.backtrack();
    if (solved) {
      this.status = 'solved';
    } else if (this.status === 'searching') {
      this.status = 'exhausted';
    }

    const result = this.result();
    const seconds = (result.elapsedMs / 1000).toFixed(2);
    if (result.status === 'solved') {
      console.log(`✅ Solution found in ${seconds}s (${result.iterations} iterations)`);
    } else {
      console.log(
        `❌ No solution (${result.status}) after ${seconds}s: best ${result.bestAssignedCount}/${result.totalVariables} assigned`
      );
    }
    return result;
  }

  private result(): SolveResult {
    const stats: SolveStats = {
      totalVariables: this.lectures.length,
      bestAssignedCount: this.bestAssignedCount,
      iterations: this.iterations,
      elapsedMs: this.clock() - this.startTime,
    };

    if (this.status === 'solved') {
      return { ...stats, status: 'solved', assignment: new Map(this.assignment) };
    }
    return { ...stats, status: this.status === 'timed-out' ? 'timed-out' : 'exhausted' };
  }

  private backtrack(): boolean {
    this.iterations++;

    // Base case: all lectures scheduled
    if (this.assignment.size === this.lectures.length) {
      return true;
    }

    if (this.clock() - this.startTime > this.timeoutMs) {
      if (this.status !== 'timed-out') {
        console.log('⏱️  Timeout reached!');
      }
      this.status = 'timed-out';
      return false;
    }

    if (this.onProgress && this.iterations % this.config.progressInterval === 0) {
      this.onProgress({
        assigned: this.assignment.size,
        total: this.lectures.length,
        iterations: this.iterations,
      });
    }

    const choice = this.selectUnassignedVariable();
    if (!choice || choice.remaining === 0) {
      return false;
    }

    const { lecture } = choice;
    const key = lectureKey(lecture);

    for (const value of this.orderDomainValues(lecture)) {
      if (!isConsistent(lecture, value, this.assignment, this.lectureIndex)) {
        continue;
      }

      this.assignment.set(key, value);
      this.bestAssignedCount = Math.max(this.bestAssignedCount, this.assignment.size);

      if (this.backtrack()) {
        return true;
      }

      // Backtrack: undo the commit
      this.assignment.delete(key);

      if (this.status === 'timed-out') {
        return false;
      }
    }

    return false;
  }

  /**
   * MRV: fewest values consistent with the current assignment, first wins on ties
   */
  private selectUnassignedVariable(): VariableChoice | null {
    let best: VariableChoice | null = null;

    for (const lecture of this.lectures) {
      if (this.assignment.has(lectureKey(lecture))) {
        continue;
      }

      let remaining = 0;
      for (const value of this.domainOf(lecture)) {
        if (isConsistent(lecture, value, this.assignment, this.lectureIndex)) {
          remaining++;
        }
      }

      if (!best || remaining < best.remaining) {
        best = { lecture, remaining };
      }
    }

    return best;
  }

  // No least-constraining-value lookahead: a uniform shuffle
  private orderDomainValues(lecture: Lecture): SlotAssignment[] {
    return shuffle(this.domainOf(lecture), this.random);
  }

  private domainOf(lecture: Lecture): readonly SlotAssignment[] {
    return this.domains.get(lectureKey(lecture)) ?? [];
  }
}

/**
 * Usage counts of a (partial or complete) assignment
 */
export function getSolutionStatistics(assignment: ReadonlyAssignment): SolutionStatistics {
  const timeslotUsage = new Map<string, number>();
  const instructorLoad = new Map<string, number>();
  const roomUsage = new Map<string, number>();

  for (const { timeslotId, roomId, instructorId } of assignment.values()) {
    timeslotUsage.set(timeslotId, (timeslotUsage.get(timeslotId) ?? 0) + 1);
    instructorLoad.set(instructorId, (instructorLoad.get(instructorId) ?? 0) + 1);
    roomUsage.set(roomId, (roomUsage.get(roomId) ?? 0) + 1);
  }

  return {
    totalAssigned: assignment.size,
    timeslotUsage: Object.fromEntries(timeslotUsage),
    instructorLoad: Object.fromEntries(instructorLoad),
    roomUsage: Object.fromEntries(roomUsage),
  };
}
