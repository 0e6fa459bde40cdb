import mongoose, { Document, Model, Schema } from "mongoose";

export enum PaymentStatus {
  PENDING = "pending",
  COMPLETED = "completed",
  FAILED = "failed",
  REFUNDED = "refunded"
}

export interface IPayment extends Document<mongoose.Types.ObjectId> {
  userId: mongoose.Types.ObjectId;
  courseId: mongoose.Types.ObjectId | null;
  eventId: mongoose.Types.ObjectId | null;
  amount: number;
  currency: string;
  paymentMethod: string;
  transactionId: string;
  status: PaymentStatus;
  gatewayResponse: string | null;
  createdAt: Date;
  updatedAt: Date;
}

const paymentSchema = new Schema<IPayment>(
  {
    userId: { type: Schema.Types.ObjectId, ref: "User", required: true, index: true },
    courseId: { type: Schema.Types.ObjectId, ref: "Course", default: null },
    eventId: { type: Schema.Types.ObjectId, ref: "Event", default: null },
    amount: { type: Number, required: true, min: 0 },
    currency: { type: String, required: true },
    paymentMethod: { type: String, required: true },
    transactionId: { type: String, required: true },
    status: {
      type: String,
      enum: Object.values(PaymentStatus),
      default: PaymentStatus.PENDING
    },
    gatewayResponse: { type: String, default: null }
  },
  { timestamps: true }
);

paymentSchema.index({ transactionId: 1 }, { unique: true, name: "transaction_id_unique" });

export const Payment: Model<IPayment> = mongoose.model<IPayment>("Payment", paymentSchema);
