import mongoose, { Document, Model, Schema } from "mongoose";

export enum RegistrationStatus {
  CONFIRMED = "confirmed",
  CANCELLED = "cancelled"
}

export interface IEventRegistration extends Document<mongoose.Types.ObjectId> {
  userId: mongoose.Types.ObjectId;
  eventId: mongoose.Types.ObjectId;
  status: RegistrationStatus;
  registeredAt: Date;
}

const eventRegistrationSchema = new Schema<IEventRegistration>({
  userId: { type: Schema.Types.ObjectId, ref: "User", required: true },
  eventId: { type: Schema.Types.ObjectId, ref: "Event", required: true },
  status: {
    type: String,
    enum: Object.values(RegistrationStatus),
    default: RegistrationStatus.CONFIRMED
  },
  registeredAt: { type: Date, default: Date.now }
});

eventRegistrationSchema.index({ userId: 1, eventId: 1 }, { unique: true, name: "user_event_unique" });

export const EventRegistration: Model<IEventRegistration> =
  mongoose.model<IEventRegistration>("EventRegistration", eventRegistrationSchema);
