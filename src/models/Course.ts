import mongoose, { Document, Model, Schema } from 'mongoose';

export interface ICourse extends Document<mongoose.Types.ObjectId> {
  title: string;
  description: string;
  category?: string;
  level?: string;
  price: number;
  image?: string;
  instructor?: mongoose.Types.ObjectId;
  studentsCount: number;
  createdAt: Date;
  updatedAt: Date;
}

const courseSchema = new Schema<ICourse>(
  {
    title: {
      type: String,
      required: [true, "Title is required"],
      trim: true,
      maxlength: [200, "Title cannot exceed 200 characters"]
    },

    description: {
      type: String,
      required: [true, "Description is required"],
      trim: true,
      maxlength: [2000, "Description cannot exceed 2000 characters"]
    },

    category: { type: String, trim: true, index: true },
    level: { type: String, enum: ["beginner", "intermediate", "advanced"] },

    price: {
      type: Number,
      required: [true, "Price is required"],
      min: [0, "Price cannot be negative"]
    },

    image: String,

    instructor: { type: mongoose.Schema.Types.ObjectId, ref: "User" },

    // Cached counter, bumped once per new enrollment
    studentsCount: { type: Number, default: 0, min: 0 }
  },
  { timestamps: true }
);

export const Course: Model<ICourse> = mongoose.model<ICourse>('Course', courseSchema);
