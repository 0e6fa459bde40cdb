// ============================================
// src/middlewares/validation.ts
// ============================================

import { NextFunction, Request, RequestHandler, Response } from 'express';
import { body, param, query, validationResult, ValidationChain } from 'express-validator';
import { EventType } from '../models/Event';
import { ValidationError } from '../utils/errors';

export interface FieldError {
  field: string;
  message: string;
}

/** Runs the chains, then turns any failure into a ValidationError. */
export const validate = (chains: ValidationChain[]): RequestHandler[] => [
  ...chains,
  (req: Request, _res: Response, next: NextFunction): void => {
    const result = validationResult(req);
    if (result.isEmpty()) {
      next();
      return;
    }

    const details: FieldError[] = result.array().map((error) => ({
      field: error.type === 'field' ? error.path : error.type,
      message: String(error.msg),
    }));
    next(new ValidationError(details[0]?.message ?? 'Validation failed', details));
  },
];

const mongoIdParam = (name: string, label: string): ValidationChain =>
  param(name).isMongoId().withMessage(`Invalid ${label} ID`);

// ============================================
// PROGRESS VALIDATION
// ============================================
export const progressValidation = {
  update: validate([
    mongoIdParam('lectureId', 'lecture'),
    body('watchedDuration')
      .optional()
      .isInt({ min: 0 })
      .withMessage('watchedDuration must be a non-negative integer')
      .toInt(),
    body('completed')
      .optional()
      .isBoolean({ strict: true })
      .withMessage('completed must be a boolean')
      .toBoolean(true),
  ]),

  course: validate([mongoIdParam('courseId', 'course')]),
};

// ============================================
// CERTIFICATE VALIDATION
// ============================================
export const certificateValidation = {
  generate: validate([mongoIdParam('courseId', 'course')]),

  verify: validate([
    param('certificateNumber')
      .trim()
      .matches(/^CERT-\d{8}-[A-Za-z0-9]{6}$/)
      .withMessage('Invalid certificate number format'),
  ]),
};

// ============================================
// PAYMENT VALIDATION
// ============================================
export const paymentValidation = {
  create: validate([
    body('courseId').optional().isMongoId().withMessage('Invalid course ID'),
    body('eventId').optional().isMongoId().withMessage('Invalid event ID'),
    body('amount')
      .optional()
      .isFloat({ gt: 0 })
      .withMessage('Amount must be greater than 0')
      .toFloat(),
    body('paymentMethod')
      .optional()
      .trim()
      .isLength({ min: 1, max: 30 })
      .withMessage('paymentMethod cannot exceed 30 characters'),
  ]),

  verify: validate([
    body('razorpay_order_id').isString().trim().notEmpty().withMessage('razorpay_order_id is required'),
    body('razorpay_payment_id').isString().trim().notEmpty().withMessage('razorpay_payment_id is required'),
    body('razorpay_signature').isString().trim().notEmpty().withMessage('razorpay_signature is required'),
  ]),
};

// ============================================
// ENROLLMENT VALIDATION
// ============================================
export const enrollmentValidation = {
  create: validate([
    body('userId').isMongoId().withMessage('Invalid user ID'),
    body('courseId').isMongoId().withMessage('Invalid course ID'),
  ]),
};

// ============================================
// EVENT VALIDATION
// ============================================
export const eventValidation = {
  byId: validate([mongoIdParam('eventId', 'event')]),

  list: validate([
    query('search').optional().isString().trim().isLength({ max: 100 }).withMessage('Search is too long'),
    query('eventType')
      .optional()
      .isIn(Object.values(EventType))
      .withMessage(`eventType must be one of: ${Object.values(EventType).join(', ')}`),
    query('dateFrom')
      .optional()
      .isDate({ format: 'YYYY-MM-DD', strictMode: true })
      .withMessage('dateFrom must be a YYYY-MM-DD date'),
    query('dateTo')
      .optional()
      .isDate({ format: 'YYYY-MM-DD', strictMode: true })
      .withMessage('dateTo must be a YYYY-MM-DD date'),
    query('limit').optional().isInt({ min: 1, max: 100 }).withMessage('Limit must be between 1 and 100').toInt(),
    query('offset').optional().isInt({ min: 0 }).withMessage('Offset must be 0 or more').toInt(),
  ]),
};
