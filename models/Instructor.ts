import mongoose, { Schema, type Model } from 'mongoose';
import { DAYS_OF_WEEK, type DayOfWeek } from '@/types';

export interface IInstructor {
  instructorId: string;
  name: string;
  role: string; // e.g., "Professor", "Assistant Professor", "TA"
  unavailableDay: DayOfWeek | null; // One weekday the instructor never teaches
  qualifiedCourses: string[]; // Course IDs
  createdAt: Date;
  updatedAt: Date;
}

const InstructorSchema = new Schema<IInstructor>(
  {
    instructorId: {
      type: String,
      required: [true, 'Instructor ID is required'],
      trim: true,
      unique: true,
    },
    name: {
      type: String,
      required: [true, 'Instructor name is required'],
      trim: true,
    },
    role: {
      type: String,
      trim: true,
      default: 'Professor',
    },
    unavailableDay: {
      type: String,
      enum: [...DAYS_OF_WEEK, null],
      default: null,
    },
    qualifiedCourses: {
      type: [String],
      default: [],
    },
  },
  {
    timestamps: true,
  }
);

// Find instructors qualified for a course
InstructorSchema.index({ qualifiedCourses: 1 });

const Instructor: Model<IInstructor> =
  mongoose.models.Instructor || mongoose.model<IInstructor>('Instructor', InstructorSchema);

export default Instructor;
