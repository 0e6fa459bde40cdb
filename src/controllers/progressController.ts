// ============================================
// src/controllers/progressController.ts
// ============================================

import { Response } from "express";
import { asyncHandler } from "../middlewares/asyncHandler";
import { AuthRequest, requireUser } from "../middlewares/auth";
import { ApiResponse } from "../utils/ApiResponse";
import { optionalBoolean, optionalNumber } from "../utils/requestBody";
import type { LectureProgressService } from "../services/lectureProgressService";

export const createProgressController = (progress: LectureProgressService) => ({
  // ==============================
  // UPDATE LECTURE PROGRESS
  // ==============================
  updateLectureProgress: asyncHandler(async (req: AuthRequest, res: Response) => {
    const user = requireUser(req);

    const result = await progress.upsertProgress(user.userId, req.params.lectureId, {
      watchedDuration: optionalNumber(req.body, "watchedDuration"),
      completed: optionalBoolean(req.body, "completed"),
    });

    res.status(200).json(ApiResponse.success(result, "Progress updated"));
  }),

  // ==============================
  // GET COURSE PROGRESS
  // ==============================
  getCourseProgress: asyncHandler(async (req: AuthRequest, res: Response) => {
    const user = requireUser(req);
    const view = await progress.getProgress(user.userId, req.params.courseId);
    res.status(200).json(ApiResponse.success(view));
  }),
});

export type ProgressController = ReturnType<typeof createProgressController>;
