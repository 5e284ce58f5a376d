/**
 * ID-keyed lookups over the reference records.
 *
 * Built once per solve request; nothing here is mutated after construction,
 * so one instance can be shared by concurrent solves.
 */

import type { DayOfWeek, RoomType } from '@/types';
import { InvalidSolverInputError } from './errors';
import {
  canTeach,
  type Course,
  type Instructor,
  type ReferenceData,
  type Room,
  type Section,
  type TimeSlot,
} from './models';

function indexById<T>(records: readonly T[], getId: (record: T) => string, kind: string): Map<string, T> {
  const index = new Map<string, T>();
  for (const record of records) {
    const id = getId(record);
    if (index.has(id)) {
      throw new InvalidSolverInputError(`Duplicate ${kind} ID: ${id}`);
    }
    index.set(id, record);
  }
  return index;
}

export class ReferenceTables {
  private readonly courses: Map<string, Course>;
  private readonly instructors: Map<string, Instructor>;
  private readonly rooms: Map<string, Room>;
  private readonly timeslots: Map<string, TimeSlot>;
  private readonly sections: Map<string, Section>;
  private readonly dayTimeslots = new Map<DayOfWeek, TimeSlot[]>();

  constructor(private readonly data: ReferenceData) {
    this.courses = indexById(data.courses, (c) => c.courseId, 'course');
    this.instructors = indexById(data.instructors, (i) => i.instructorId, 'instructor');
    this.rooms = indexById(data.rooms, (r) => r.roomId, 'room');
    this.timeslots = indexById(data.timeslots, (t) => t.timeslotId, 'timeslot');
    this.sections = indexById(data.sections, (s) => s.sectionId, 'section');

    for (const slot of data.timeslots) {
      const slots = this.dayTimeslots.get(slot.day) ?? [];
      slots.push(slot);
      this.dayTimeslots.set(slot.day, slots);
    }
    // Array.prototype.sort is stable: equal positions keep table order
    for (const slots of this.dayTimeslots.values()) {
      slots.sort((a, b) => a.position - b.position);
    }
  }

  getCourse(courseId: string): Course | undefined {
    return this.courses.get(courseId);
  }

  getInstructor(instructorId: string): Instructor | undefined {
    return this.instructors.get(instructorId);
  }

  getRoom(roomId: string): Room | undefined {
    return this.rooms.get(roomId);
  }

  getTimeslot(timeslotId: string): TimeSlot | undefined {
    return this.timeslots.get(timeslotId);
  }

  getSection(sectionId: string): Section | undefined {
    return this.sections.get(sectionId);
  }

  /** Instructors qualified for the course, in table order */
  getQualifiedInstructors(courseId: string): Instructor[] {
    return this.data.instructors.filter((instructor) => canTeach(instructor, courseId));
  }

  getInstructorUnavailableDay(instructorId: string): DayOfWeek | null {
    return this.instructors.get(instructorId)?.unavailableDay ?? null;
  }

  /** Rooms of the given type, in table order */
  getRoomsByType(type: RoomType): Room[] {
    return this.data.rooms.filter((room) => room.type === type);
  }

  /** All timeslots, in table order */
  getTimeslots(): readonly TimeSlot[] {
    return this.data.timeslots;
  }

  /** The weekday's timeslots ordered by position */
  getTimeslotsForDay(day: DayOfWeek): readonly TimeSlot[] {
    return this.dayTimeslots.get(day) ?? [];
  }

  getSectionCourses(sectionId: string): string[] {
    return this.sections.get(sectionId)?.courses ?? [];
  }

  getSectionIds(): string[] {
    return this.data.sections.map((section) => section.sectionId);
  }
}
