import { Request, Response } from "express";
import { asyncHandler } from "../middlewares/asyncHandler";
import { AuthRequest, requireUser } from "../middlewares/auth";
import { ApiResponse } from "../utils/ApiResponse";
import type { CertificateService } from "../services/certificateService";

export const createCertificateController = (certificates: CertificateService) => ({
  // ==============================
  // GENERATE CERTIFICATE (completed course)
  // ==============================
  generateCertificate: asyncHandler(async (req: AuthRequest, res: Response) => {
    const user = requireUser(req);
    const result = await certificates.issue(user.userId, req.params.courseId);

    if (result.alreadyIssued) {
      res.status(200).json(ApiResponse.success(result, "Certificate already issued"));
      return;
    }
    res.status(201).json(ApiResponse.success(result, "Certificate generated", 201));
  }),

  // ==============================
  // MY CERTIFICATES
  // ==============================
  getMyCertificates: asyncHandler(async (req: AuthRequest, res: Response) => {
    const user = requireUser(req);
    res.status(200).json(ApiResponse.list(await certificates.listForUser(user.userId)));
  }),

  // ==============================
  // VERIFY CERTIFICATE (public)
  // ==============================
  verifyCertificate: asyncHandler(async (req: Request, res: Response) => {
    const verification = await certificates.verify(req.params.certificateNumber);
    res.status(200).json(ApiResponse.success(verification, "Certificate is valid"));
  }),
});

export type CertificateController = ReturnType<typeof createCertificateController>;
