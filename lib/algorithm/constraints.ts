/**
 * Hard constraints for the timetable CSP
 *
 * 1. No instructor teaches two lectures in the same timeslot
 * 2. No room hosts two lectures in the same timeslot
 * 3. No section (its students) attends two lectures in the same timeslot
 *
 * Everything here is pure: assignments are read, never copied or mutated.
 */

import {
  lectureKey,
  type Lecture,
  type LectureIndex,
  type LectureKey,
  type ReadonlyAssignment,
  type SlotAssignment,
} from './models';

export type ConflictKind = 'instructor' | 'room' | 'section';

export interface Conflict {
  kind: ConflictKind;
  resourceId: string; // Instructor, room or section ID
  timeslotId: string;
  lectureKeys: LectureKey[];
  message: string;
}

const CONFLICT_LABELS: Record<ConflictKind, string> = {
  instructor: 'Instructor',
  room: 'Room',
  section: 'Section',
};

// Busy tracking key: "resource@timeslot"
function busyKey(resourceId: string, timeslotId: string): string {
  return `${resourceId}@${timeslotId}`;
}

/**
 * True iff assigning `value` to `lecture` leaves the resulting assignment
 * free of all three double-bookings. The whole resulting assignment is
 * checked, not only the new pair; an existing entry for the same lecture
 * is treated as replaced.
 */
export function isConsistent(
  lecture: Lecture,
  value: SlotAssignment,
  assignment: ReadonlyAssignment,
  lectures: LectureIndex
): boolean {
  const instructorBusy = new Set<string>([busyKey(value.instructorId, value.timeslotId)]);
  const roomBusy = new Set<string>([busyKey(value.roomId, value.timeslotId)]);
  const sectionBusy = new Set<string>([busyKey(lecture.sectionId, value.timeslotId)]);
  const ownKey = lectureKey(lecture);

  for (const [key, assigned] of assignment) {
    if (key === ownKey) {
      continue;
    }

    const instructorKey = busyKey(assigned.instructorId, assigned.timeslotId);
    if (instructorBusy.has(instructorKey)) {
      return false;
    }
    instructorBusy.add(instructorKey);

    const roomKey = busyKey(assigned.roomId, assigned.timeslotId);
    if (roomBusy.has(roomKey)) {
      return false;
    }
    roomBusy.add(roomKey);

    const sectionId = lectures.get(key)?.sectionId;
    if (sectionId === undefined) {
      continue;
    }
    const sectionKey = busyKey(sectionId, assigned.timeslotId);
    if (sectionBusy.has(sectionKey)) {
      return false;
    }
    sectionBusy.add(sectionKey);
  }

  return true;
}

/**
 * True iff the (partial or complete) assignment violates no hard constraint
 */
export function checkAllConstraints(assignment: ReadonlyAssignment, lectures: LectureIndex): boolean {
  return findAllConflicts(assignment, lectures).length === 0;
}

/**
 * Every violation, one record per rule per colliding (resource, timeslot).
 * A lecture pair clashing on instructor, room and section yields three records.
 * Diagnostic only; the search never calls this.
 */
export function findAllConflicts(assignment: ReadonlyAssignment, lectures: LectureIndex): Conflict[] {
  const schedules: Record<ConflictKind, Map<string, { resourceId: string; timeslotId: string; keys: LectureKey[] }>> = {
    instructor: new Map(),
    room: new Map(),
    section: new Map(),
  };

  const track = (kind: ConflictKind, resourceId: string, timeslotId: string, key: LectureKey): void => {
    const schedule = schedules[kind];
    const slotKey = busyKey(resourceId, timeslotId);
    const entry = schedule.get(slotKey);
    if (entry) {
      entry.keys.push(key);
    } else {
      schedule.set(slotKey, { resourceId, timeslotId, keys: [key] });
    }
  };

  for (const [key, { timeslotId, roomId, instructorId }] of assignment) {
    track('instructor', instructorId, timeslotId, key);
    track('room', roomId, timeslotId, key);

    const lecture = lectures.get(key);
    if (lecture) {
      track('section', lecture.sectionId, timeslotId, key);
    }
  }

  const conflicts: Conflict[] = [];
  for (const kind of ['instructor', 'room', 'section'] as const) {
    for (const { resourceId, timeslotId, keys } of schedules[kind].values()) {
      if (keys.length > 1) {
        conflicts.push({
          kind,
          resourceId,
          timeslotId,
          lectureKeys: keys,
          message: `${CONFLICT_LABELS[kind]} ${resourceId} has conflict at ${timeslotId}: ${keys.join(', ')}`,
        });
      }
    }
  }

  return conflicts;
}
