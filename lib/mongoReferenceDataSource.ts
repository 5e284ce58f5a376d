import dbConnect from '@/lib/dbConnect';
import type { ReferenceDataSource } from '@/lib/referenceData';
import { assignDayPositions } from '@/lib/timeslots';
import type { ReferenceData } from '@/lib/algorithm/models';
import { Course, Instructor, Room, Section, TimeSlot } from '@/models';
import type { ICourse, IInstructor, IRoom, ISection, ITimeSlot } from '@/models';

type Raw<T> = Omit<T, 'createdAt' | 'updatedAt'>;

export interface RawReferenceDocs {
  courses: Raw<ICourse>[];
  instructors: Raw<IInstructor>[];
  rooms: Raw<IRoom>[];
  timeslots: Raw<ITimeSlot>[];
  sections: Raw<ISection>[];
}

/**
 * Map lean documents to scheduler records, keeping collection order.
 * Timeslots without a stored position get one from their start time.
 */
export function toReferenceData(docs: RawReferenceDocs): ReferenceData {
  return {
    courses: docs.courses.map(({ courseId, courseName, credits, type }) => ({
      courseId,
      courseName,
      credits,
      type,
    })),
    instructors: docs.instructors.map(({ instructorId, name, role, unavailableDay, qualifiedCourses }) => ({
      instructorId,
      name,
      role,
      unavailableDay: unavailableDay ?? null,
      qualifiedCourses: [...qualifiedCourses],
    })),
    rooms: docs.rooms.map(({ roomId, type, capacity }) => ({ roomId, type, capacity })),
    timeslots: assignDayPositions(docs.timeslots),
    sections: docs.sections.map(({ sectionId, studentCount, courses }) => ({
      sectionId,
      studentCount,
      courses: [...courses],
    })),
  };
}

/**
 * Reads the five reference collections from MongoDB
 */
export class MongoReferenceDataSource implements ReferenceDataSource {
  constructor(private readonly uri?: string) {}

  async load(): Promise<ReferenceData> {
    await dbConnect(this.uri);

    // Insertion order is the order domains are enumerated in
    const [courses, instructors, rooms, timeslots, sections] = await Promise.all([
      Course.find().sort({ _id: 1 }).lean(),
      Instructor.find().sort({ _id: 1 }).lean(),
      Room.find().sort({ _id: 1 }).lean(),
      TimeSlot.find().sort({ _id: 1 }).lean(),
      Section.find().sort({ _id: 1 }).lean(),
    ]);

    console.log(
      `📊 Loaded ${courses.length} courses, ${instructors.length} instructors, ${rooms.length} rooms, ` +
        `${timeslots.length} timeslots, ${sections.length} sections`
    );

    return toReferenceData({ courses, instructors, rooms, timeslots, sections });
  }
}
