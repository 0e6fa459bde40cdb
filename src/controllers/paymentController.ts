import { Response } from "express";
import { asyncHandler } from "../middlewares/asyncHandler";
import { AuthRequest, requireUser } from "../middlewares/auth";
import { ApiResponse } from "../utils/ApiResponse";
import { optionalNumber, optionalString, requiredString } from "../utils/requestBody";
import type { PaymentService } from "../services/paymentService";

export const createPaymentController = (payments: PaymentService) => ({
  // ==============================
  // CREATE PAYMENT ORDER
  // ==============================
  createPayment: asyncHandler(async (req: AuthRequest, res: Response) => {
    const user = requireUser(req);

    const order = await payments.createPayment(user, {
      courseId: optionalString(req.body, "courseId"),
      eventId: optionalString(req.body, "eventId"),
      amount: optionalNumber(req.body, "amount"),
      paymentMethod: optionalString(req.body, "paymentMethod"),
    });

    res.status(201).json(ApiResponse.success(order, "Payment order created", 201));
  }),

  // ==============================
  // VERIFY PAYMENT (gateway callback from checkout)
  // ==============================
  verifyPayment: asyncHandler(async (req: AuthRequest, res: Response) => {
    const user = requireUser(req);

    const result = await payments.completePayment(user, {
      orderId: requiredString(req.body, "razorpay_order_id"),
      paymentId: requiredString(req.body, "razorpay_payment_id"),
      signature: requiredString(req.body, "razorpay_signature"),
    });

    res.status(200).json(ApiResponse.success(result, "Payment verified successfully"));
  }),

  // ==============================
  // MY TRANSACTIONS
  // ==============================
  getTransactions: asyncHandler(async (req: AuthRequest, res: Response) => {
    const user = requireUser(req);
    res.status(200).json(ApiResponse.list(await payments.listTransactions(user.userId)));
  }),
});

export type PaymentController = ReturnType<typeof createPaymentController>;
