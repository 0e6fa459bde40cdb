// ============================================
// src/middlewares/rateLimiter.ts - In-Memory Only
// ============================================

import rateLimit, { Options, RateLimitRequestHandler } from 'express-rate-limit';
import { config } from '../config/env';

// ============================================
// HELPER FUNCTION TO CREATE RATE LIMITERS
// ============================================
const createLimiter = (options: Partial<Options>): RateLimitRequestHandler => {
  return rateLimit({
    standardHeaders: true,
    legacyHeaders: false,
    ...options,
  });
};

// ============================================
// RATE LIMITERS (In-memory)
// ============================================
export const apiLimiter = createLimiter({
  windowMs: 15 * 60 * 1000, // 15 minutes
  limit: config.isDevelopment ? 10000 : 300,
  message: {
    success: false,
    error: 'Too many requests, please try again later.',
    code: 'RATE_LIMITED',
  },
});

export const paymentLimiter = createLimiter({
  windowMs: 15 * 60 * 1000,
  limit: config.isDevelopment ? 1000 : 20,
  message: {
    success: false,
    error: 'Too many payment attempts. Please try again after 15 minutes.',
    code: 'RATE_LIMITED',
  },
});

// Public certificate lookups
export const verifyLimiter = createLimiter({
  windowMs: 60 * 1000,
  limit: config.isDevelopment ? 1000 : 60,
  message: {
    success: false,
    error: 'Too many verification requests. Please try again later.',
    code: 'RATE_LIMITED',
  },
});
