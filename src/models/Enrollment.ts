import mongoose, { Schema, Model, Document } from "mongoose";

export interface IEnrollment extends Document<mongoose.Types.ObjectId> {
  userId: mongoose.Types.ObjectId;
  courseId: mongoose.Types.ObjectId;

  progress: number;
  completed: boolean;
  completedAt: Date | null;
  enrolledAt: Date;

  // Bumped at the start of every progress transaction so concurrent
  // writers on the same enrollment conflict instead of interleaving.
  lockVersion: number;

  createdAt: Date;
  updatedAt: Date;
}

const enrollmentSchema = new Schema<IEnrollment>(
  {
    userId: {
      type: Schema.Types.ObjectId,
      ref: "User",
      required: true,
    },

    courseId: {
      type: Schema.Types.ObjectId,
      ref: "Course",
      required: true,
    },

    progress: { type: Number, default: 0, min: 0, max: 100 },
    completed: { type: Boolean, default: false },
    completedAt: { type: Date, default: null },
    enrolledAt: { type: Date, default: Date.now },
    lockVersion: { type: Number, default: 0 }
  },
  { timestamps: true }
);

// Unique per user per course
enrollmentSchema.index({ userId: 1, courseId: 1 }, { unique: true, name: "user_course_unique" });

enrollmentSchema.index({ courseId: 1 });

export const Enrollment: Model<IEnrollment> =
  mongoose.model<IEnrollment>("Enrollment", enrollmentSchema);
