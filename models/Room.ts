import mongoose, { Schema, type Model } from 'mongoose';

export interface IRoom {
  roomId: string; // e.g., "R101", "L3" - prefix + number, used for room distance
  type: 'Lecture' | 'Lab';
  capacity: number;
  createdAt: Date;
  updatedAt: Date;
}

const RoomSchema = new Schema<IRoom>(
  {
    roomId: {
      type: String,
      required: [true, 'Room ID is required'],
      trim: true,
      unique: true,
    },
    type: {
      type: String,
      enum: ['Lecture', 'Lab'],
      required: [true, 'Room type is required'],
    },
    capacity: {
      type: Number,
      min: [0, 'Capacity cannot be negative'],
      default: 0,
    },
  },
  {
    timestamps: true,
  }
);

RoomSchema.index({ type: 1 });

const Room: Model<IRoom> = mongoose.models.Room || mongoose.model<IRoom>('Room', RoomSchema);

export default Room;
