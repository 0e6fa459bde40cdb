// ============================================
// src/config/env.ts
// ============================================

import dotenv from 'dotenv';

dotenv.config();

const toNumber = (value: string | undefined, fallback: number): number => {
  if (value === undefined || value.trim() === '') return fallback;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
};

export interface AppConfig {
  nodeEnv: string;
  isDevelopment: boolean;
  port: number;
  mongoUri: string;
  clientUrl?: string;
  dashboardUrl: string;
  jwtSecret: string;
  certificateBaseUrl: string;
  razorpay: {
    keyId: string;
    keySecret: string;
    currency: string;
    timeoutMs: number;
  };
  twilio: {
    accountSid?: string;
    authToken?: string;
    whatsappNumber: string;
    timeoutMs: number;
  };
}

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
  const nodeEnv = env.NODE_ENV || 'development';

  return Object.freeze({
    nodeEnv,
    isDevelopment: nodeEnv === 'development',
    port: toNumber(env.PORT, 5000),
    mongoUri: env.MONGODB_URI || 'mongodb://localhost:27017/course-progress',
    clientUrl: env.CLIENT_URL,
    dashboardUrl: env.DASHBOARD_URL || 'http://localhost:3000/dashboard',
    jwtSecret: env.JWT_SECRET || '',
    certificateBaseUrl: (env.CERTIFICATE_BASE_URL || 'http://localhost:5000/certificates').replace(/\/+$/, ''),
    razorpay: {
      keyId: env.RAZORPAY_KEY_ID || '',
      keySecret: env.RAZORPAY_KEY_SECRET || '',
      currency: env.PAYMENT_CURRENCY || 'INR',
      timeoutMs: toNumber(env.PAYMENT_GATEWAY_TIMEOUT_MS, 10000),
    },
    twilio: {
      accountSid: env.TWILIO_ACCOUNT_SID,
      authToken: env.TWILIO_AUTH_TOKEN,
      whatsappNumber: env.TWILIO_WHATSAPP_NUMBER || 'whatsapp:+14155238886',
      timeoutMs: toNumber(env.NOTIFICATION_TIMEOUT_MS, 5000),
    },
  });
};

export const config = loadConfig();
