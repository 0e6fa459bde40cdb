import express from "express";
import { protect } from "../middlewares/auth";
import { progressValidation } from "../middlewares/validation";
import type { ProgressController } from "../controllers/progressController";

export const createProgressRouter = (controller: ProgressController) => {
  const progressRouter = express.Router();

  progressRouter.use(protect);

  progressRouter.post("/lectures/:lectureId", progressValidation.update, controller.updateLectureProgress);
  progressRouter.get("/courses/:courseId", progressValidation.course, controller.getCourseProgress);

  return progressRouter;
};
