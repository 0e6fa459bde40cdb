import mongoose, { Document, Model, Schema } from 'mongoose';

export interface ILectureProgress extends Document<mongoose.Types.ObjectId> {
  enrollmentId: mongoose.Types.ObjectId;
  lectureId: mongoose.Types.ObjectId;
  watchedDuration: number; // in seconds
  completed: boolean;
  completedAt: Date | null;
  createdAt: Date;
  updatedAt: Date;
}

const lectureProgressSchema = new Schema<ILectureProgress>(
  {
    enrollmentId: { type: Schema.Types.ObjectId, ref: 'Enrollment', required: true },
    lectureId: { type: Schema.Types.ObjectId, ref: 'Lecture', required: true },
    watchedDuration: { type: Number, default: 0, min: 0 },
    completed: { type: Boolean, default: false },
    completedAt: { type: Date, default: null }
  },
  { timestamps: true }
);

lectureProgressSchema.index(
  { enrollmentId: 1, lectureId: 1 },
  { unique: true, name: 'enrollment_lecture_unique' }
);

export const LectureProgress: Model<ILectureProgress> =
  mongoose.model<ILectureProgress>('LectureProgress', lectureProgressSchema);
