import mongoose, { Schema, type Model } from 'mongoose';

/**
 * SECTION MODEL - a group of students taking the same courses
 *
 * Every course listed here becomes one or more weekly lectures for the section,
 * and no two of the section's lectures may share a timeslot.
 */

export interface ISection {
  sectionId: string; // e.g., "S1_L1"
  studentCount: number;
  courses: string[]; // Ordered course IDs
  createdAt: Date;
  updatedAt: Date;
}

const SectionSchema = new Schema<ISection>(
  {
    sectionId: {
      type: String,
      required: [true, 'Section ID is required'],
      trim: true,
      unique: true,
    },
    studentCount: {
      type: Number,
      min: [0, 'Student count cannot be negative'],
      default: 0,
    },
    courses: {
      type: [String],
      required: [true, 'At least one course is required'],
      validate: {
        validator: function (v: string[]) {
          return v && v.length > 0;
        },
        message: 'At least one course must be assigned to the section',
      },
    },
  },
  {
    timestamps: true,
  }
);

const Section: Model<ISection> = mongoose.models.Section || mongoose.model<ISection>('Section', SectionSchema);

export default Section;
