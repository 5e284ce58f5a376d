import mongoose, { Schema, type Model } from 'mongoose';
import { DAYS_OF_WEEK, type DayOfWeek } from '@/types';

/**
 * TIME SLOT MODEL
 *
 * One teachable slot in the weekly grid.
 *
 * Example:
 * - timeslotId: "TS1"
 * - day: "Sunday"
 * - startTime: "10:45", endTime: "12:15"
 * - position: 1 (second slot of Sunday)
 *
 * position is optional; when missing it is derived from startTime within the day.
 */

export interface ITimeSlot {
  timeslotId: string;
  day: DayOfWeek;
  startTime: string; // HH:mm format
  endTime: string; // HH:mm format
  position?: number | null;
  createdAt: Date;
  updatedAt: Date;
}

const TIME_PATTERN = /^([01]\d|2[0-3]):[0-5]\d$/;

const TimeSlotSchema = new Schema<ITimeSlot>(
  {
    timeslotId: {
      type: String,
      required: [true, 'Timeslot ID is required'],
      trim: true,
      unique: true,
    },
    day: {
      type: String,
      required: [true, 'Day is required'],
      enum: DAYS_OF_WEEK,
    },
    startTime: {
      type: String,
      required: [true, 'Start time is required'],
      match: [TIME_PATTERN, 'Start time must be in HH:mm format'],
    },
    endTime: {
      type: String,
      required: [true, 'End time is required'],
      match: [TIME_PATTERN, 'End time must be in HH:mm format'],
    },
    position: {
      type: Number,
      min: [0, 'Position cannot be negative'],
      default: null,
    },
  },
  {
    timestamps: true,
  }
);

// Ordered slots of a day
TimeSlotSchema.index({ day: 1, startTime: 1 });

// Pre-validate: a slot must end after it starts
TimeSlotSchema.pre('validate', function (next) {
  if (this.startTime && this.endTime && this.endTime <= this.startTime) {
    return next(new Error(`Timeslot ${this.timeslotId} must end after it starts`));
  }
  next();
});

const TimeSlot: Model<ITimeSlot> =
  mongoose.models.TimeSlot || mongoose.model<ITimeSlot>('TimeSlot', TimeSlotSchema);

export default TimeSlot;
