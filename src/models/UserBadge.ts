import mongoose, { Document, Model, Schema } from "mongoose";

export interface IUserBadge extends Document<mongoose.Types.ObjectId> {
  userId: mongoose.Types.ObjectId;
  name: string;
  description: string;
  icon: string;
  awardedAt: Date;
}

const userBadgeSchema = new Schema<IUserBadge>({
  userId: { type: Schema.Types.ObjectId, ref: "User", required: true },
  name: { type: String, required: true },
  description: { type: String, required: true },
  icon: { type: String, required: true },
  awardedAt: { type: Date, default: Date.now }
});

userBadgeSchema.index({ userId: 1, name: 1 }, { unique: true, name: "user_badge_unique" });

export const UserBadge: Model<IUserBadge> = mongoose.model<IUserBadge>("UserBadge", userBadgeSchema);
