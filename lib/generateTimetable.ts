/**
 * Generate a timetable end to end:
 * load reference data -> build lectures & domains -> backtracking search
 * -> verify hard constraints -> score quality.
 *
 * Follows the { success, message } result convention: bad input and data
 * source failures come back as success: false, search failure too.
 */

import type { ScoringOverrides } from '@/lib/algorithm/config';
import { findAllConflicts } from '@/lib/algorithm/constraints';
import { InvalidSolverInputError } from '@/lib/algorithm/errors';
import type { Assignment, ReferenceData } from '@/lib/algorithm/models';
import {
  buildProblem,
  summarizeProblem,
  type BuildDiagnostic,
  type ProblemSummary,
  type TimetableProblem,
} from '@/lib/algorithm/problemBuilder';
import { QualityScorer, type QualityReport } from '@/lib/algorithm/qualityScorer';
import { ReferenceTables } from '@/lib/algorithm/referenceTables';
import {
  getSolutionStatistics,
  TimetableSolver,
  type SolutionStatistics,
  type SolveResult,
  type SolverOptions,
} from '@/lib/algorithm/scheduler';
import type { ReferenceDataSource } from '@/lib/referenceData';

export interface GenerateTimetableRequest extends SolverOptions {
  sectionIds?: string[]; // Empty or omitted = every section
  scoring?: ScoringOverrides;
}

export interface GenerateTimetableResult {
  success: boolean;
  message: string;
  status?: SolveResult['status'];
  assignment?: Assignment;
  quality?: QualityReport;
  statistics?: SolutionStatistics;
  diagnostics: BuildDiagnostic[];
  summary?: ProblemSummary;
  iterations?: number;
  elapsedMs?: number;
  bestAssignedCount?: number;
  totalLectures?: number;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export async function generateTimetable(
  source: ReferenceDataSource,
  request: GenerateTimetableRequest = {}
): Promise<GenerateTimetableResult> {
  console.log('\n' + '='.repeat(60));
  console.log('🚀 GENERATING TIMETABLE WITH CSP SOLVER');
  console.log('='.repeat(60));

  const { sectionIds, scoring, ...solverOptions } = request;

  // Step 1: Load reference data
  console.log('\n📂 Step 1: Loading reference data...');
  let data: ReferenceData;
  try {
    data = await source.load();
  } catch (error) {
    console.error('❌ Failed to load reference data:', error);
    return { success: false, message: `Failed to load reference data: ${errorMessage(error)}`, diagnostics: [] };
  }

  // Step 2: Build the CSP problem
  console.log('\n🔨 Step 2: Building CSP problem...');
  const diagnostics: BuildDiagnostic[] = [];
  let problem: TimetableProblem;
  let scorer: QualityScorer;
  let solver: TimetableSolver;
  try {
    const tables = new ReferenceTables(data);
    const requested = sectionIds && sectionIds.length > 0 ? sectionIds : tables.getSectionIds();
    problem = buildProblem(requested, tables, diagnostics);
    scorer = new QualityScorer(tables, problem.lectureIndex, scoring);
    solver = new TimetableSolver(problem.lectures, problem.domains, solverOptions);
  } catch (error) {
    if (error instanceof InvalidSolverInputError) {
      console.error(`❌ Invalid input: ${error.message}`);
      return { success: false, message: error.message, diagnostics };
    }
    throw error;
  }

  const summary = summarizeProblem(problem);

  // Step 3: Solve
  console.log('\n🧠 Step 3: Solving...');
  const result = solver.solve();
  const stats = {
    iterations: result.iterations,
    elapsedMs: result.elapsedMs,
    bestAssignedCount: result.bestAssignedCount,
    totalLectures: result.totalVariables,
  };

  if (result.status !== 'solved') {
    const message =
      result.status === 'timed-out'
        ? `Timed out: best partial schedule placed ${result.bestAssignedCount}/${result.totalVariables} lectures`
        : `No conflict-free timetable exists for the requested sections (best ${result.bestAssignedCount}/${result.totalVariables})`;
    return { success: false, message, status: result.status, diagnostics, summary, ...stats };
  }

  // Step 4: Verify hard constraints on the solution
  console.log('\n🔍 Step 4: Verifying solution...');
  const conflicts = findAllConflicts(result.assignment, problem.lectureIndex);
  if (conflicts.length > 0) {
    throw new Error(`Solver returned a conflicting timetable: ${conflicts.map((c) => c.message).join('; ')}`);
  }

  // Step 5: Score quality
  console.log('\n📊 Step 5: Evaluating timetable quality...');
  const quality = scorer.evaluate(result.assignment);
  const { breakdown } = quality;
  console.log(`   Base Score:        ${breakdown.baseScore.toFixed(2)}`);
  console.log(`   - Gap Penalty:     -${breakdown.gapPenalty.toFixed(2)}`);
  console.log(`   + Balance Bonus:   +${breakdown.balanceBonus.toFixed(2)}`);
  console.log(`   - Time Preference: -${breakdown.timePreferencePenalty.toFixed(2)}`);
  console.log(`   - Room Distance:   -${breakdown.roomDistancePenalty.toFixed(2)}`);
  console.log(`🏆 Final Score: ${quality.score.toFixed(2)} (${quality.rating})`);

  return {
    success: true,
    message: `Scheduled ${result.assignment.size} lectures (score ${quality.score.toFixed(2)})`,
    status: 'solved',
    assignment: result.assignment,
    quality,
    statistics: getSolutionStatistics(result.assignment),
    diagnostics,
    summary,
    ...stats,
  };
}
