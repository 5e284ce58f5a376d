import mongoose, { Schema, type Model } from 'mongoose';

/**
 * COURSE MODEL
 *
 * Credits decide how many weekly lectures each section gets:
 * 1-2 credits -> 1, 3-4 -> 2, 5 -> 3, anything else -> 2.
 *
 * Example:
 * - courseId: "AID312"
 * - courseName: "Intelligent Systems"
 * - credits: 3
 * - type: "Lecture and Lab" (needs a Lab room)
 */

export interface ICourse {
  courseId: string;
  courseName: string;
  credits: number;
  type: 'Lecture' | 'Lecture and Lab';
  createdAt: Date;
  updatedAt: Date;
}

const CourseSchema = new Schema<ICourse>(
  {
    courseId: {
      type: String,
      required: [true, 'Course ID is required'],
      trim: true,
      uppercase: true,
      unique: true,
    },
    courseName: {
      type: String,
      required: [true, 'Course name is required'],
      trim: true,
    },
    credits: {
      type: Number,
      required: [true, 'Credits are required'],
      min: [1, 'Credits must be at least 1'],
    },
    type: {
      type: String,
      enum: ['Lecture', 'Lecture and Lab'],
      default: 'Lecture',
      required: [true, 'Course type is required'],
    },
  },
  {
    timestamps: true,
  }
);

const Course: Model<ICourse> = mongoose.models.Course || mongoose.model<ICourse>('Course', CourseSchema);

export default Course;
