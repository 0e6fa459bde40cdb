import mongoose, { Document, Model, Schema } from "mongoose";

export interface ILecture extends Document<mongoose.Types.ObjectId> {
  courseId: mongoose.Types.ObjectId;
  title: string;
  description?: string;
  videoUrl?: string;
  duration: number; // in minutes
  order: number;
  createdAt: Date;
  updatedAt: Date;
}

const lectureSchema = new Schema<ILecture>(
  {
    courseId: { type: Schema.Types.ObjectId, ref: "Course", required: true, index: true },
    title: { type: String, required: [true, "Lecture title is required"], trim: true },
    description: String,
    videoUrl: String,
    duration: { type: Number, required: true, min: 0 },
    order: { type: Number, required: true },
  },
  { timestamps: true }
);

lectureSchema.index({ courseId: 1, order: 1 });

export const Lecture: Model<ILecture> = mongoose.model<ILecture>("Lecture", lectureSchema);
