import mongoose, { Document, Schema, Model } from "mongoose";

export interface ICertificate extends Document<mongoose.Types.ObjectId> {
  userId: mongoose.Types.ObjectId;
  courseId: mongoose.Types.ObjectId;
  certificateNumber: string;
  certificateUrl: string;
  issuedAt: Date;
  createdAt: Date;
  updatedAt: Date;
}

const certificateSchema = new Schema<ICertificate>(
{
  userId: { type: Schema.Types.ObjectId, ref: 'User', required: true, index: true },
  courseId: { type: Schema.Types.ObjectId, ref: 'Course', required: true },

  certificateNumber: { type: String, required: true, uppercase: true },
  certificateUrl: { type: String, required: true },
  issuedAt: { type: Date, default: Date.now }
},
{ timestamps: true }
);

certificateSchema.index({ certificateNumber: 1 }, { unique: true, name: 'certificate_number_unique' });
certificateSchema.index({ userId: 1, courseId: 1 }, { unique: true, name: 'user_course_unique' });

export const Certificate: Model<ICertificate> = mongoose.model<ICertificate>('Certificate', certificateSchema);
