// ============================================
// src/index.ts - Main Server Entry Point
// ============================================

import http from 'http';
import { config } from './config/env';
import { connectDB, disconnectDB } from './config/database';
import { createApp } from './app';
import { createMongoStore } from './repositories/mongoStore';
import { EnrollmentLedger } from './services/enrollmentLedger';
import { LectureProgressService } from './services/lectureProgressService';
import { CertificateService } from './services/certificateService';
import { PaymentService } from './services/paymentService';
import { EventService } from './services/eventService';
import { RazorpayGateway } from './services/paymentGateway';
import { WhatsAppService } from './services/whatsappService';
import { Logger } from './utils/loggers';
import { errorMessage } from './utils/errors';

const bootstrap = async (): Promise<http.Server> => {
  if (!config.jwtSecret) {
    throw new Error('JWT_SECRET is not set');
  }

  await connectDB(config.mongoUri);

  const store = createMongoStore();
  const notifier = new WhatsAppService(config.twilio);
  const gateway = new RazorpayGateway(config.razorpay);

  const ledger = new EnrollmentLedger(store);
  const app = createApp({
    ledger,
    progress: new LectureProgressService(store, ledger),
    certificates: new CertificateService(store, notifier, { certificateBaseUrl: config.certificateBaseUrl }),
    payments: new PaymentService(store, ledger, gateway, notifier, {
      currency: config.razorpay.currency,
      gatewayTimeoutMs: config.razorpay.timeoutMs,
      dashboardUrl: config.dashboardUrl,
    }),
    events: new EventService(store, notifier),
  });

  const server = http.createServer(app);
  server.listen(config.port, () => {
    Logger.info(`Server running in ${config.nodeEnv} mode`);
    Logger.info(`Listening on port ${config.port}`);
  });
  return server;
};

// ============================================
// GRACEFUL SHUTDOWN
// ============================================
const registerShutdown = (server: http.Server): void => {
  let isShuttingDown = false;

  const gracefulShutdown = async (signal: string): Promise<void> => {
    if (isShuttingDown) return;
    isShuttingDown = true;
    Logger.info(`${signal} received. Shutting down gracefully...`);

    // Force shutdown safety net
    setTimeout(() => {
      Logger.error('Forced shutdown after timeout');
      process.exit(1);
    }, 10000).unref();

    try {
      await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
      Logger.info('HTTP server closed');
      await disconnectDB();
      Logger.success('Graceful shutdown complete');
      process.exit(0);
    } catch (error) {
      Logger.error('Error during shutdown', errorMessage(error));
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => void gracefulShutdown('SIGTERM'));
  process.on('SIGINT', () => void gracefulShutdown('SIGINT'));
};

process.on('unhandledRejection', (reason: unknown) => {
  Logger.error('UNHANDLED REJECTION', reason);
});

bootstrap()
  .then(registerShutdown)
  .catch((error: unknown) => {
    Logger.error('Startup failed', errorMessage(error));
    process.exit(1);
  });
