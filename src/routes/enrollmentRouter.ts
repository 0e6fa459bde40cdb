import express from "express";
import { protect } from "../middlewares/auth";
import { adminOnly } from "../middlewares/adminAuth";
import { enrollmentValidation } from "../middlewares/validation";
import type { EnrollmentController } from "../controllers/enrollmentController";

export const createEnrollmentRouter = (controller: EnrollmentController) => {
  const enrollmentRouter = express.Router();

  enrollmentRouter.use(protect);

  // Student
  enrollmentRouter.get("/me", controller.getMyEnrollments);
  enrollmentRouter.get("/overview", controller.getOverview);

  // Admin
  enrollmentRouter.post("/", adminOnly, enrollmentValidation.create, controller.enrollStudent);

  return enrollmentRouter;
};
