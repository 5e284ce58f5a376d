/**
 * Timetable CSP - Problem Builder
 *
 * Creates the CSP variables (one Lecture per weekly session of each course
 * of each section) and their domains.
 *
 * Domain = every (timeslot, room, instructor) triple that passes the unary rules:
 * 1. Room type matches the course (lab courses only get lab rooms)
 * 2. Instructor is qualified for the course
 * 3. Instructor is not unavailable on the timeslot's weekday
 *
 * Domains are built once per request and never mutated by the search.
 */

import {
  createLecture,
  indexLectures,
  isAvailableOnDay,
  lectureKey,
  requiredRoomType,
  type Domains,
  type Lecture,
  type LectureIndex,
  type LectureKey,
  type SlotAssignment,
} from './models';
import { InvalidSolverInputError } from './errors';
import type { ReferenceTables } from './referenceTables';

export type BuildDiagnosticKind =
  | 'unknown-section'
  | 'missing-course'
  | 'no-qualified-instructor'
  | 'no-matching-room';

export interface BuildDiagnostic {
  kind: BuildDiagnosticKind;
  sectionId?: string;
  courseId: string | null;
  message: string;
}

export interface TimetableProblem {
  lectures: Lecture[];
  lectureIndex: LectureIndex;
  domains: Domains;
  diagnostics: BuildDiagnostic[];
}

export interface ProblemSummary {
  totalVariables: number;
  totalDomains: number;
  averageDomainSize: number;
  minDomainSize: number;
  maxDomainSize: number;
  lecturesPerSection: Record<string, number>;
}

// Weekly sessions by credit count; anything else gets the default
const LECTURES_PER_CREDIT: Record<number, number> = {
  1: 1,
  2: 1,
  3: 2, // Most 3-credit courses have 2 sessions/week
  4: 2,
  5: 3,
};
const DEFAULT_LECTURES_PER_WEEK = 2;

export function lecturesPerWeek(credits: number): number {
  return LECTURES_PER_CREDIT[credits] ?? DEFAULT_LECTURES_PER_WEEK;
}

function report(diagnostics: BuildDiagnostic[], diagnostic: BuildDiagnostic): void {
  console.warn(`⚠️  ${diagnostic.message}`);
  diagnostics.push(diagnostic);
}

/**
 * Expand sections into lectures, e.g. a 5-credit course becomes 3 lectures.
 * Unknown sections and unknown courses are skipped with a diagnostic.
 */
export function buildLectures(
  sectionIds: readonly string[],
  tables: ReferenceTables,
  diagnostics: BuildDiagnostic[] = []
): Lecture[] {
  const lectures: Lecture[] = [];

  for (const sectionId of sectionIds) {
    if (!tables.getSection(sectionId)) {
      report(diagnostics, {
        kind: 'unknown-section',
        sectionId,
        courseId: null,
        message: `Section ${sectionId} not found`,
      });
      continue;
    }

    for (const courseId of tables.getSectionCourses(sectionId)) {
      const course = tables.getCourse(courseId);
      if (!course) {
        report(diagnostics, {
          kind: 'missing-course',
          sectionId,
          courseId,
          message: `Course ${courseId} not found (section ${sectionId})`,
        });
        continue;
      }

      const count = lecturesPerWeek(course.credits);
      for (let lectureNumber = 1; lectureNumber <= count; lectureNumber++) {
        lectures.push(createLecture(sectionId, courseId, lectureNumber));
      }
    }
  }

  return lectures;
}

/**
 * Build the domain of every lecture.
 * Order: timeslots (table order) > rooms of the matching type > qualified instructors.
 * A course without instructors or rooms still gets an entry, with an empty domain.
 */
export function buildDomains(
  lectures: readonly Lecture[],
  tables: ReferenceTables,
  diagnostics: BuildDiagnostic[] = []
): Map<LectureKey, readonly SlotAssignment[]> {
  const domains = new Map<LectureKey, readonly SlotAssignment[]>();
  // Lectures of the same course share one (read-only) domain
  const byCourse = new Map<string, readonly SlotAssignment[]>();

  for (const lecture of lectures) {
    let domain = byCourse.get(lecture.courseId);

    if (!domain) {
      domain = buildCourseDomain(lecture.courseId, tables, diagnostics);
      byCourse.set(lecture.courseId, domain);
    }

    domains.set(lectureKey(lecture), domain);
  }

  return domains;
}

function buildCourseDomain(
  courseId: string,
  tables: ReferenceTables,
  diagnostics: BuildDiagnostic[]
): readonly SlotAssignment[] {
  const domain: SlotAssignment[] = [];
  const course = tables.getCourse(courseId);

  if (!course) {
    report(diagnostics, { kind: 'missing-course', courseId, message: `Course ${courseId} not found` });
    return domain;
  }

  const instructors = tables.getQualifiedInstructors(courseId);
  if (instructors.length === 0) {
    report(diagnostics, {
      kind: 'no-qualified-instructor',
      courseId,
      message: `No instructors for ${courseId}`,
    });
    return domain;
  }

  const roomType = requiredRoomType(course);
  const rooms = tables.getRoomsByType(roomType);
  if (rooms.length === 0) {
    report(diagnostics, {
      kind: 'no-matching-room',
      courseId,
      message: `No ${roomType} rooms for ${courseId}`,
    });
    return domain;
  }

  for (const timeslot of tables.getTimeslots()) {
    for (const room of rooms) {
      for (const instructor of instructors) {
        if (!isAvailableOnDay(instructor, timeslot.day)) {
          continue; // Instructor not available
        }
        domain.push(
          Object.freeze({
            timeslotId: timeslot.timeslotId,
            roomId: room.roomId,
            instructorId: instructor.instructorId,
          })
        );
      }
    }
  }

  return Object.freeze(domain);
}

/**
 * Build lectures and domains for the requested sections.
 * Rejects a request with no lectures or with colliding lecture keys;
 * diagnostics gathered before the rejection stay in `diagnostics`.
 */
export function buildProblem(
  sectionIds: readonly string[],
  tables: ReferenceTables,
  diagnostics: BuildDiagnostic[] = []
): TimetableProblem {
  console.log(`🔨 Building lectures for ${sectionIds.length} sections...`);
  const lectures = buildLectures(sectionIds, tables, diagnostics);

  if (lectures.length === 0) {
    throw new InvalidSolverInputError('No lectures to schedule for the requested sections');
  }

  const lectureIndex = indexLectures(lectures);
  if (lectureIndex.size !== lectures.length) {
    throw new InvalidSolverInputError('Lecture identity keys are not unique (section listed twice?)');
  }

  const domains = buildDomains(lectures, tables, diagnostics);
  const problem: TimetableProblem = { lectures, lectureIndex, domains, diagnostics };

  const summary = summarizeProblem(problem);
  console.log(`📋 Problem: ${summary.totalVariables} lectures, ${summary.totalDomains} domains`);
  console.log(
    `   Domain size: avg ${summary.averageDomainSize.toFixed(0)}, range ${summary.minDomainSize} to ${summary.maxDomainSize}`
  );

  return problem;
}

export function summarizeProblem(problem: TimetableProblem): ProblemSummary {
  const sizes = [...problem.domains.values()].map((domain) => domain.length);
  const sectionCounts = new Map<string, number>();

  for (const lecture of problem.lectures) {
    sectionCounts.set(lecture.sectionId, (sectionCounts.get(lecture.sectionId) ?? 0) + 1);
  }

  return {
    totalVariables: problem.lectures.length,
    totalDomains: problem.domains.size,
    averageDomainSize: sizes.length > 0 ? sizes.reduce((sum, size) => sum + size, 0) / sizes.length : 0,
    minDomainSize: sizes.length > 0 ? Math.min(...sizes) : 0,
    maxDomainSize: sizes.length > 0 ? Math.max(...sizes) : 0,
    lecturesPerSection: Object.fromEntries(sectionCounts),
  };
}
