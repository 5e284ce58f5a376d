/**
 * Central export point for all Mongoose models
 * Import models from here to ensure proper initialization order
 */

export { default as Course } from './Course';
export { default as Instructor } from './Instructor';
export { default as Room } from './Room';
export { default as TimeSlot } from './TimeSlot';
export { default as Section } from './Section';

// Re-export types
export type { ICourse } from './Course';
export type { IInstructor } from './Instructor';
export type { IRoom } from './Room';
export type { ITimeSlot } from './TimeSlot';
export type { ISection } from './Section';
