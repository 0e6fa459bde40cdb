// ============================================
// src/app.ts - Express application
// ============================================

import express, { Application, Request, Response } from 'express';
import cors, { CorsOptions } from 'cors';
import helmet from 'helmet';
import morgan from 'morgan';
import cookieParser from 'cookie-parser';

import { config } from './config/env';
import { Logger } from './utils/loggers';
import { ApiResponse } from './utils/ApiResponse';
import { apiLimiter } from './middlewares/rateLimiter';
import { errorHandler } from './middlewares/errorHandler';
import { notFound } from './middlewares/notFound';

import type { EnrollmentLedger } from './services/enrollmentLedger';
import type { LectureProgressService } from './services/lectureProgressService';
import type { CertificateService } from './services/certificateService';
import type { PaymentService } from './services/paymentService';
import type { EventService } from './services/eventService';

import { createProgressController } from './controllers/progressController';
import { createCertificateController } from './controllers/certificateController';
import { createPaymentController } from './controllers/paymentController';
import { createEnrollmentController } from './controllers/enrollmentController';
import { createEventController } from './controllers/eventController';

import { createProgressRouter } from './routes/progressRouter';
import { createCertificateRouter } from './routes/certificateRouter';
import { createPaymentRouter } from './routes/paymentRouter';
import { createEnrollmentRouter } from './routes/enrollmentRouter';
import { createEventRouter } from './routes/eventRouter';

export interface AppServices {
  ledger: EnrollmentLedger;
  progress: LectureProgressService;
  certificates: CertificateService;
  payments: PaymentService;
  events: EventService;
}

const allowedOrigins = ['http://localhost:3000', config.clientUrl].filter(
  (origin): origin is string => Boolean(origin)
);

const corsOptions: CorsOptions = {
  origin: (origin, callback) => {
    // Allow requests with no origin (mobile apps, curl)
    if (!origin || allowedOrigins.includes(origin)) {
      callback(null, true);
      return;
    }
    Logger.warning('CORS blocked origin', origin);
    callback(new Error('Not allowed by CORS'));
  },
  credentials: true,
  methods: ['GET', 'POST', 'PUT', 'PATCH', 'DELETE', 'OPTIONS'],
  allowedHeaders: ['Content-Type', 'Authorization'],
};

export const createApp = (services: AppServices): Application => {
  const app: Application = express();

  // ============================================
  // MIDDLEWARE CONFIGURATION
  // ============================================
  app.use(helmet());
  app.use(cors(corsOptions));
  app.use(express.json({ limit: '1mb' }));
  app.use(express.urlencoded({ extended: true, limit: '1mb' }));
  app.use(cookieParser());

  if (config.nodeEnv !== 'test') {
    app.use(morgan(config.isDevelopment ? 'dev' : 'combined'));
  }
  app.use('/api/', apiLimiter);

  // ============================================
  // API ROUTES
  // ============================================
  app.get('/health', (_req: Request, res: Response) => {
    res.status(200).json(
      ApiResponse.success(
        {
          timestamp: new Date().toISOString(),
          uptime: process.uptime(),
          environment: config.nodeEnv,
        },
        'Server is healthy'
      )
    );
  });

  app.get('/api', (_req: Request, res: Response) => {
    res.status(200).json(
      ApiResponse.success(
        {
          version: '1.0.0',
          endpoints: {
            progress: '/api/v1/progress',
            certificates: '/api/v1/certificates',
            payments: '/api/v1/payments',
            enrollments: '/api/v1/enrollments',
            events: '/api/v1/events',
          },
        },
        'Welcome to Course Progress API'
      )
    );
  });

  app.use('/api/v1/progress', createProgressRouter(createProgressController(services.progress)));
  app.use('/api/v1/certificates', createCertificateRouter(createCertificateController(services.certificates)));
  app.use('/api/v1/payments', createPaymentRouter(createPaymentController(services.payments)));
  app.use('/api/v1/enrollments', createEnrollmentRouter(createEnrollmentController(services.ledger)));
  app.use('/api/v1/events', createEventRouter(createEventController(services.events)));

  // Error Handling
  app.use(notFound);
  app.use(errorHandler);

  return app;
};
