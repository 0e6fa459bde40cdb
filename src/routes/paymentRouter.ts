import express from "express";
import { protect } from "../middlewares/auth";
import { paymentLimiter } from "../middlewares/rateLimiter";
import { paymentValidation } from "../middlewares/validation";
import type { PaymentController } from "../controllers/paymentController";

export const createPaymentRouter = (controller: PaymentController) => {
  const paymentRouter = express.Router();

  paymentRouter.use(protect);

  paymentRouter.post("/create", paymentLimiter, paymentValidation.create, controller.createPayment);
  paymentRouter.post("/verify", paymentLimiter, paymentValidation.verify, controller.verifyPayment);
  paymentRouter.get("/transactions", controller.getTransactions);

  return paymentRouter;
};
