import express from "express";
import { protect } from "../middlewares/auth";
import { verifyLimiter } from "../middlewares/rateLimiter";
import { certificateValidation } from "../middlewares/validation";
import type { CertificateController } from "../controllers/certificateController";

export const createCertificateRouter = (controller: CertificateController) => {
  const certificateRouter = express.Router();

  // ============================================
  // PUBLIC ROUTES
  // ============================================
  certificateRouter.get(
    "/verify/:certificateNumber",
    verifyLimiter,
    certificateValidation.verify,
    controller.verifyCertificate
  );

  // ============================================
  // STUDENT ROUTES
  // ============================================
  certificateRouter.get("/me", protect, controller.getMyCertificates);

  certificateRouter.post(
    "/generate/:courseId",
    protect,
    certificateValidation.generate,
    controller.generateCertificate
  );

  return certificateRouter;
};
