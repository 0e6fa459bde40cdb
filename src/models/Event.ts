import mongoose, { Document, Model, Schema } from "mongoose";

export enum EventType {
  WORKSHOP = "workshop",
  WEBINAR = "webinar",
  BOOTCAMP = "bootcamp"
}

export interface IEvent extends Document<mongoose.Types.ObjectId> {
  title: string;
  description: string;
  eventType: EventType;
  date: Date;
  time: string; // HH:MM
  duration: number; // in minutes
  location?: string;
  eventUrl?: string;
  capacity: number;
  registered: number;
  createdAt: Date;
  updatedAt: Date;
}

const eventSchema = new Schema<IEvent>(
  {
    title: { type: String, required: true, trim: true },
    description: { type: String, default: "" },
    eventType: { type: String, enum: Object.values(EventType), default: EventType.WEBINAR },
    date: { type: Date, required: true, index: true },
    time: { type: String, required: true, match: [/^\d{2}:\d{2}$/, "Time must be HH:MM"] },
    duration: { type: Number, required: true, min: 1 },
    location: String,
    eventUrl: String,
    capacity: { type: Number, required: true, min: 0 },
    registered: { type: Number, default: 0, min: 0 }
  },
  { timestamps: true }
);

export const Event: Model<IEvent> = mongoose.model<IEvent>("Event", eventSchema);
