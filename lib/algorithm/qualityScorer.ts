/**
 * Timetable Quality Scoring (soft constraints)
 *
 * score = base - gapPenalty + balanceBonus - timePreferencePenalty - roomDistancePenalty
 *
 * - Gap penalty: idle slots between a section's first and last session of a day
 * - Balance bonus: even spread of each section's sessions over its teaching days
 * - Time preference: sessions in the early / late slot sets
 * - Room distance: far rooms for back-to-back sessions (section and instructor views)
 *
 * Runs only on a completed assignment and never feeds back into the search.
 */

import type { DayOfWeek } from '@/types';
import { resolveScoringConfig, type ScoringConfig, type ScoringOverrides } from './config';
import type { LectureIndex, ReadonlyAssignment, SlotAssignment } from './models';
import type { ReferenceTables } from './referenceTables';

export type QualityRating = 'Excellent' | 'Good' | 'Fair' | 'Acceptable' | 'Needs Improvement';

export interface QualityBreakdown {
  baseScore: number;
  gapPenalty: number;
  balanceBonus: number;
  timePreferencePenalty: number;
  roomDistancePenalty: number;
}

export interface QualityReport {
  score: number;
  breakdown: QualityBreakdown;
  rating: QualityRating;
}

// A placed session on a weekday, `index` = position in the day's ordered slots
interface DaySession {
  index: number;
  roomId: string;
}

type DaySchedules = Map<string, DaySession[]>;

// Rooms with different prefixes (e.g. lab vs lecture block)
const CROSS_BUILDING_DISTANCE = 3;
const UNNUMBERED_ROOM_DISTANCE = 1;
const ROOM_NUMBERS_PER_DISTANCE_UNIT = 5;
const MAX_BALANCE_SCORE = 5;

/**
 * Abstract distance between two rooms:
 * same ID = 0, same prefix = |number difference| / 5 (floored), different prefix = 3
 */
export function roomDistance(roomA: string, roomB: string): number {
  if (roomA === roomB) {
    return 0;
  }

  const a = splitRoomId(roomA);
  const b = splitRoomId(roomB);

  if (a.prefix !== b.prefix) {
    return CROSS_BUILDING_DISTANCE;
  }
  if (a.number === null || b.number === null) {
    return UNNUMBERED_ROOM_DISTANCE;
  }
  return Math.floor(Math.abs(a.number - b.number) / ROOM_NUMBERS_PER_DISTANCE_UNIT);
}

function splitRoomId(roomId: string): { prefix: string; number: number | null } {
  const match = /^(.*?)(\d+)$/.exec(roomId);
  if (!match) {
    return { prefix: roomId, number: null };
  }
  return { prefix: match[1], number: parseInt(match[2], 10) };
}

export function ratingFor(score: number): QualityRating {
  if (score >= 900) return 'Excellent';
  if (score >= 800) return 'Good';
  if (score >= 700) return 'Fair';
  if (score >= 600) return 'Acceptable';
  return 'Needs Improvement';
}

export class QualityScorer {
  private readonly config: ScoringConfig;
  private readonly earlySlots: ReadonlySet<string>;
  private readonly lateSlots: ReadonlySet<string>;

  constructor(
    private readonly tables: ReferenceTables,
    private readonly lectures: LectureIndex,
    overrides: ScoringOverrides = {}
  ) {
    this.config = resolveScoringConfig(overrides);
    this.earlySlots = new Set(this.config.earlySlots);
    this.lateSlots = new Set(this.config.lateSlots);
  }

  evaluate(assignment: ReadonlyAssignment): QualityReport {
    const breakdown: QualityBreakdown = {
      baseScore: this.config.baseScore,
      gapPenalty: this.gapPenalty(assignment),
      balanceBonus: this.balanceBonus(assignment),
      timePreferencePenalty: this.timePreferencePenalty(assignment),
      roomDistancePenalty: this.roomDistancePenalty(assignment),
    };

    const score =
      breakdown.baseScore -
      breakdown.gapPenalty +
      breakdown.balanceBonus -
      breakdown.timePreferencePenalty -
      breakdown.roomDistancePenalty;

    return { score, breakdown, rating: ratingFor(score) };
  }

  score(assignment: ReadonlyAssignment): number {
    return this.evaluate(assignment).score;
  }

  gapPenalty(assignment: ReadonlyAssignment): number {
    let penalty = 0;

    for (const sessions of this.groupBySectionAndDay(assignment).values()) {
      for (let i = 0; i < sessions.length - 1; i++) {
        const gapSize = sessions[i + 1].index - sessions[i].index - 1;
        if (gapSize > 0) {
          penalty += gapSize * this.config.weights.gap;
        }
      }
    }

    return penalty;
  }

  balanceBonus(assignment: ReadonlyAssignment): number {
    const sectionDayCounts = new Map<string, Map<DayOfWeek, number>>();

    for (const [key, value] of assignment) {
      const sectionId = this.lectures.get(key)?.sectionId;
      const day = this.tables.getTimeslot(value.timeslotId)?.day;
      if (sectionId === undefined || day === undefined) {
        continue;
      }

      const dayCounts = sectionDayCounts.get(sectionId) ?? new Map<DayOfWeek, number>();
      dayCounts.set(day, (dayCounts.get(day) ?? 0) + 1);
      sectionDayCounts.set(sectionId, dayCounts);
    }

    let bonus = 0;
    for (const dayCounts of sectionDayCounts.values()) {
      const values = [...dayCounts.values()];
      const mean = values.reduce((sum, count) => sum + count, 0) / values.length;
      const variance = values.reduce((sum, count) => sum + (count - mean) ** 2, 0) / values.length;
      const stdDev = Math.sqrt(variance);

      // Lower std dev = more balanced = higher bonus
      bonus += Math.max(0, MAX_BALANCE_SCORE - stdDev) * this.config.weights.balance;
    }

    return bonus;
  }

  timePreferencePenalty(assignment: ReadonlyAssignment): number {
    let penalty = 0;

    for (const { timeslotId } of assignment.values()) {
      if (this.earlySlots.has(timeslotId)) {
        penalty += this.config.weights.earlyPenalty;
      }
      if (this.lateSlots.has(timeslotId)) {
        penalty += this.config.weights.latePenalty;
      }
    }

    return penalty;
  }

  roomDistancePenalty(assignment: ReadonlyAssignment): number {
    let penalty = 0;

    // Section and instructor views are counted independently
    for (const sessions of this.groupBySectionAndDay(assignment).values()) {
      penalty += this.consecutiveRoomPenalty(sessions);
    }
    for (const sessions of this.groupByInstructorAndDay(assignment).values()) {
      penalty += this.consecutiveRoomPenalty(sessions);
    }

    return penalty;
  }

  private consecutiveRoomPenalty(sessions: readonly DaySession[]): number {
    let penalty = 0;

    for (let i = 0; i < sessions.length - 1; i++) {
      const current = sessions[i];
      const next = sessions[i + 1];

      // Back-to-back only
      if (next.index !== current.index + 1) {
        continue;
      }

      const distance = roomDistance(current.roomId, next.roomId);
      if (distance > this.config.roomDistanceThreshold) {
        penalty += distance * this.config.weights.roomDistance;
      }
    }

    return penalty;
  }

  private groupBySectionAndDay(assignment: ReadonlyAssignment): DaySchedules {
    return this.groupByDay(assignment, (key) => this.lectures.get(key)?.sectionId);
  }

  private groupByInstructorAndDay(assignment: ReadonlyAssignment): DaySchedules {
    return this.groupByDay(assignment, (_key, value) => value.instructorId);
  }

  /**
   * Sessions per (owner, day), each list sorted by slot order within the day
   */
  private groupByDay(
    assignment: ReadonlyAssignment,
    ownerOf: (key: string, value: SlotAssignment) => string | undefined
  ): DaySchedules {
    const grouped: DaySchedules = new Map();

    for (const [key, value] of assignment) {
      const owner = ownerOf(key, value);
      const timeslot = this.tables.getTimeslot(value.timeslotId);
      if (owner === undefined || !timeslot) {
        continue;
      }

      const index = this.tables
        .getTimeslotsForDay(timeslot.day)
        .findIndex((slot) => slot.timeslotId === timeslot.timeslotId);

      const groupKey = `${owner}|${timeslot.day}`;
      const sessions = grouped.get(groupKey) ?? [];
      sessions.push({ index, roomId: value.roomId });
      grouped.set(groupKey, sessions);
    }

    for (const sessions of grouped.values()) {
      sessions.sort((a, b) => a.index - b.index);
    }

    return grouped;
  }
}

/**
 * One-shot scoring with default or overridden weights
 */
export function scoreTimetable(
  assignment: ReadonlyAssignment,
  tables: ReferenceTables,
  lectures: LectureIndex,
  overrides: ScoringOverrides = {}
): QualityReport {
  return new QualityScorer(tables, lectures, overrides).evaluate(assignment);
}
