/**
 * Timetable CSP - Entity Model
 *
 * Read-only reference records supplied by the data source, plus the Lecture
 * (the CSP variable) and its assignment value.
 *
 * A Lecture is one weekly session of a course for a section:
 * - sectionId: "S1_L1"
 * - courseId: "AID312"
 * - lectureNumber: 2 (second session of the week)
 *
 * Its value is a { timeslotId, roomId, instructorId } triple.
 */

import type { CourseType, DayOfWeek, RoomType } from '@/types';

export interface Course {
  courseId: string;
  courseName: string;
  credits: number;
  type: CourseType;
}

export interface Instructor {
  instructorId: string;
  name: string;
  role: string;
  unavailableDay: DayOfWeek | null;
  qualifiedCourses: string[];
}

export interface Room {
  roomId: string;
  type: RoomType;
  capacity: number;
}

export interface TimeSlot {
  timeslotId: string;
  day: DayOfWeek;
  position: number; // Ordered position within the day, 0-based
  startTime: string; // HH:mm
  endTime: string; // HH:mm
}

export interface Section {
  sectionId: string;
  studentCount: number;
  courses: string[]; // Ordered course IDs
}

export interface ReferenceData {
  courses: Course[];
  instructors: Instructor[];
  rooms: Room[];
  timeslots: TimeSlot[];
  sections: Section[];
}

export interface Lecture {
  readonly sectionId: string;
  readonly courseId: string;
  readonly lectureNumber: number; // 1st, 2nd, 3rd session of the week
}

// "<section>_<course>_L<number>" with "\" and "_" escaped inside IDs, unique per problem instance
export type LectureKey = string;

export interface SlotAssignment {
  readonly timeslotId: string;
  readonly roomId: string;
  readonly instructorId: string;
}

// Partial or complete assignment: lecture key -> chosen value
export type Assignment = Map<LectureKey, SlotAssignment>;

export type ReadonlyAssignment = ReadonlyMap<LectureKey, SlotAssignment>;

export type Domains = ReadonlyMap<LectureKey, readonly SlotAssignment[]>;

export type LectureIndex = ReadonlyMap<LectureKey, Lecture>;

export function createLecture(sectionId: string, courseId: string, lectureNumber: number): Lecture {
  return Object.freeze({ sectionId, courseId, lectureNumber });
}

function escapeKeyPart(id: string): string {
  return id.replace(/[\\_]/g, '\\$&');
}

/**
 * Identity key of a lecture, e.g. "S2_AID312_L2".
 * Underscores inside IDs are escaped: section "S1_L1" gives "S1\_L1_AID312_L2",
 * so "S1_L1" + "X" and "S1" + "L1_X" never share a key.
 */
export function lectureKey(lecture: Lecture): LectureKey {
  return `${escapeKeyPart(lecture.sectionId)}_${escapeKeyPart(lecture.courseId)}_L${lecture.lectureNumber}`;
}

export function indexLectures(lectures: readonly Lecture[]): Map<LectureKey, Lecture> {
  const index = new Map<LectureKey, Lecture>();
  for (const lecture of lectures) {
    index.set(lectureKey(lecture), lecture);
  }
  return index;
}

export function courseNeedsLab(course: Course): boolean {
  return course.type.includes('Lab');
}

export function requiredRoomType(course: Course): RoomType {
  return courseNeedsLab(course) ? 'Lab' : 'Lecture';
}

export function canTeach(instructor: Instructor, courseId: string): boolean {
  return instructor.qualifiedCourses.includes(courseId);
}

export function isAvailableOnDay(instructor: Instructor, day: DayOfWeek): boolean {
  if (instructor.unavailableDay === null) {
    return true;
  }
  return instructor.unavailableDay !== day;
}

export function describeTimeSlot(slot: TimeSlot): string {
  return `${slot.day} ${slot.startTime}-${slot.endTime}`;
}
