import type { DayOfWeek } from '@/types';
import type { ReferenceData, TimeSlot } from '@/lib/algorithm/models';

export function daySlots(day: DayOfWeek, ids: string[]): TimeSlot[] {
  const starts = ['09:00', '10:45', '12:30', '14:15', '16:00'];
  const ends = ['10:30', '12:15', '14:00', '15:45', '17:30'];
  return ids.map((timeslotId, position) => ({
    timeslotId,
    day,
    position,
    startTime: starts[position],
    endTime: ends[position],
  }));
}

/**
 * Two teaching days of four slots, three rooms, three instructors.
 *
 * - AID312 (3 credits, lab): only PROF01, who is away on Monday -> Sunday + L1 only
 * - PHY113 (2 credits): PROF01 or PROF02, lecture rooms
 * - LRA101 (1 credit): PROF02
 * - MTH201 (5 credits): PROF02, or PROF03 who is away on Sunday
 */
export function sampleReferenceData(): ReferenceData {
  return {
    courses: [
      { courseId: 'AID312', courseName: 'Intelligent Systems', credits: 3, type: 'Lecture and Lab' },
      { courseId: 'PHY113', courseName: 'Physics', credits: 2, type: 'Lecture' },
      { courseId: 'LRA101', courseName: 'Linear Algebra', credits: 1, type: 'Lecture' },
      { courseId: 'MTH201', courseName: 'Calculus II', credits: 5, type: 'Lecture' },
    ],
    instructors: [
      {
        instructorId: 'PROF01',
        name: 'Dr. Example',
        role: 'Professor',
        unavailableDay: 'Monday',
        qualifiedCourses: ['AID312', 'PHY113'],
      },
      {
        instructorId: 'PROF02',
        name: 'Dr. Sample',
        role: 'Assistant Professor',
        unavailableDay: null,
        qualifiedCourses: ['PHY113', 'LRA101', 'MTH201'],
      },
      {
        instructorId: 'PROF03',
        name: 'Dr. Placeholder',
        role: 'Lecturer',
        unavailableDay: 'Sunday',
        qualifiedCourses: ['MTH201'],
      },
    ],
    rooms: [
      { roomId: 'R101', type: 'Lecture', capacity: 40 },
      { roomId: 'R102', type: 'Lecture', capacity: 40 },
      { roomId: 'L1', type: 'Lab', capacity: 25 },
    ],
    timeslots: [
      ...daySlots('Sunday', ['TS0', 'TS1', 'TS2', 'TS3']),
      ...daySlots('Monday', ['TS4', 'TS5', 'TS6', 'TS7']),
    ],
    sections: [
      { sectionId: 'S1', studentCount: 30, courses: ['AID312', 'PHY113'] },
      { sectionId: 'S2', studentCount: 28, courses: ['PHY113', 'LRA101'] },
      { sectionId: 'S3', studentCount: 20, courses: ['MTH201'] },
    ],
  };
}
