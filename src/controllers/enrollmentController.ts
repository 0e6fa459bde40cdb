import { Response } from "express";
import { asyncHandler } from "../middlewares/asyncHandler";
import { AuthRequest, requireUser } from "../middlewares/auth";
import { ApiResponse } from "../utils/ApiResponse";
import { requiredString } from "../utils/requestBody";
import type { EnrollmentLedger } from "../services/enrollmentLedger";

export const createEnrollmentController = (ledger: EnrollmentLedger) => ({
  // ==============================
  // MY ENROLLMENTS
  // ==============================
  getMyEnrollments: asyncHandler(async (req: AuthRequest, res: Response) => {
    const user = requireUser(req);
    res.status(200).json(ApiResponse.list(await ledger.listForUser(user.userId)));
  }),

  // ==============================
  // DASHBOARD OVERVIEW
  // ==============================
  getOverview: asyncHandler(async (req: AuthRequest, res: Response) => {
    const user = requireUser(req);
    res.status(200).json(ApiResponse.success(await ledger.overview(user.userId)));
  }),

  // ==============================
  // ADMIN GRANT
  // ==============================
  enrollStudent: asyncHandler(async (req: AuthRequest, res: Response) => {
    const enrollment = await ledger.create(requiredString(req.body, "userId"), requiredString(req.body, "courseId"));

    res.status(201).json(
      ApiResponse.success(
        {
          enrollmentId: enrollment.id,
          userId: enrollment.userId,
          courseId: enrollment.courseId,
          enrolledAt: enrollment.enrolledAt.toISOString(),
        },
        "Student enrolled",
        201
      )
    );
  }),
});

export type EnrollmentController = ReturnType<typeof createEnrollmentController>;
