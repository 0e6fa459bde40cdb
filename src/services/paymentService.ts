// ============================================
// src/services/paymentService.ts
// ============================================

import { randomUUID } from 'crypto';
import type { LmsStore, PaymentRecord, Repositories } from '../repositories/types';
import { PaymentStatus } from '../models/Payment';
import { RegistrationStatus } from '../models/EventRegistration';
import type { Principal } from '../types/auth';
import {
  AppError,
  ConflictError,
  DuplicateKeyError,
  ExternalServiceError,
  ForbiddenError,
  NotFoundError,
  PreconditionFailedError,
  ValidationError,
  errorMessage,
} from '../utils/errors';
import { withTimeout } from '../utils/withTimeout';
import { Logger } from '../utils/loggers';
import type { EnrollmentLedger } from './enrollmentLedger';
import type { PaymentGateway } from './paymentGateway';
import { Notifier, runInBackground } from './whatsappService';

export interface CreatePaymentInput {
  courseId?: string;
  eventId?: string;
  amount?: number;
  paymentMethod?: string;
}

export interface CheckoutOrder {
  paymentId: string;
  orderId: string;
  amount: number;
  currency: string;
  paymentMethod: string;
  userName: string;
  userEmail: string;
  userPhone: string | null;
  keyId: string;
}

export interface CompletePaymentInput {
  orderId: string;
  paymentId: string;
  signature: string;
}

export type CompletionOutcome =
  | { kind: 'course'; courseId: string; enrollmentId: string; created: boolean }
  | { kind: 'event'; eventId: string; registrationId: string; created: boolean };

export interface CompletedPayment {
  paymentId: string;
  status: PaymentStatus;
  outcome: CompletionOutcome;
}

export interface TransactionView {
  paymentId: string;
  orderId: string;
  courseId: string | null;
  eventId: string | null;
  amount: number;
  currency: string;
  paymentMethod: string;
  status: PaymentStatus;
  createdAt: string;
}

interface PaymentServiceOptions {
  currency: string;
  gatewayTimeoutMs: number;
  dashboardUrl: string;
  now?: () => Date;
}

export class PaymentService {
  private readonly now: () => Date;

  constructor(
    private readonly store: LmsStore,
    private readonly ledger: EnrollmentLedger,
    private readonly gateway: PaymentGateway,
    private readonly notifier: Notifier,
    private readonly options: PaymentServiceOptions
  ) {
    this.now = options.now ?? (() => new Date());
  }

  async createPayment(principal: Principal, input: CreatePaymentInput): Promise<CheckoutOrder> {
    const { courseId, eventId } = input;
    if ((courseId && eventId) || (!courseId && !eventId)) {
      throw new ValidationError('Either courseId or eventId is required', [
        { field: 'courseId', message: 'Provide exactly one of courseId or eventId' },
      ]);
    }

    const amount = await this.resolveAmount(input);
    const paymentMethod = input.paymentMethod ?? 'rupay';

    let orderId: string;
    try {
      const order = await withTimeout(
        this.gateway.createOrder({ amount, currency: this.options.currency, receipt: randomUUID() }),
        this.options.gatewayTimeoutMs,
        'Payment order creation'
      );
      orderId = order.id;
    } catch (error) {
      if (error instanceof AppError) throw error;
      throw new ExternalServiceError('payment-gateway', `Payment initialization failed: ${errorMessage(error)}`);
    }

    const payment = await this.store.payments.insert({
      userId: principal.userId,
      courseId: courseId ?? null,
      eventId: eventId ?? null,
      amount,
      currency: this.options.currency,
      paymentMethod,
      transactionId: orderId,
      status: PaymentStatus.PENDING,
      gatewayResponse: null,
    });
    Logger.info('Payment order created', { paymentId: payment.id, orderId });

    return {
      paymentId: payment.id,
      orderId,
      amount,
      currency: payment.currency,
      paymentMethod,
      userName: principal.name,
      userEmail: principal.email,
      userPhone: principal.phone,
      keyId: this.gateway.keyId,
    };
  }

  async completePayment(principal: Principal, input: CompletePaymentInput): Promise<CompletedPayment> {
    const payment = await this.store.payments.findByTransactionId(input.orderId);
    if (!payment) throw new NotFoundError('Payment record not found');
    if (payment.userId !== principal.userId) throw new ForbiddenError('Payment belongs to another user');
    if (payment.status === PaymentStatus.REFUNDED) {
      throw new PreconditionFailedError('Payment has been refunded');
    }

    try {
      await withTimeout(this.gateway.verifyPayment(input), this.options.gatewayTimeoutMs, 'Payment verification');
    } catch (error) {
      await this.markFailed(payment, error);
      if (error instanceof AppError) throw error;
      throw new ExternalServiceError('payment-gateway', `Payment verification failed: ${errorMessage(error)}`);
    }

    let outcome: CompletionOutcome;
    try {
      outcome = await this.settle(payment, input.paymentId);
    } catch (error) {
      await this.markFailed(payment, error);
      throw error;
    }

    if (outcome.kind === 'course' && outcome.created) {
      const { courseId } = outcome;
      runInBackground('Enrollment notification', () => this.notifyEnrollment(payment.userId, courseId));
    }
    Logger.success('Payment completed', { paymentId: payment.id, outcome: outcome.kind });

    return { paymentId: payment.id, status: PaymentStatus.COMPLETED, outcome };
  }

  async listTransactions(userId: string): Promise<TransactionView[]> {
    const payments = await this.store.payments.listByUser(userId);
    return payments
      .slice()
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime())
      .map((payment) => ({
        paymentId: payment.id,
        orderId: payment.transactionId,
        courseId: payment.courseId,
        eventId: payment.eventId,
        amount: payment.amount,
        currency: payment.currency,
        paymentMethod: payment.paymentMethod,
        status: payment.status,
        createdAt: payment.createdAt.toISOString(),
      }));
  }

  private async resolveAmount({ courseId, eventId, amount }: CreatePaymentInput): Promise<number> {
    if (courseId) {
      const course = await this.store.courses.findById(courseId);
      if (!course) throw new NotFoundError('Course not found');
      return course.price;
    }

    if (eventId) {
      const event = await this.store.events.findById(eventId);
      if (!event) throw new NotFoundError('Event not found');
    }
    if (amount === undefined || !Number.isFinite(amount) || amount <= 0) {
      throw new ValidationError('Amount must be greater than 0', [
        { field: 'amount', message: 'Must be greater than 0' },
      ]);
    }
    return amount;
  }

  /**
   * Runs the completion transaction. A unique-index violation means a
   * concurrent completion committed first; the retry then sees its rows.
   */
  private async settle(payment: PaymentRecord, gatewayPaymentId: string): Promise<CompletionOutcome> {
    try {
      return await this.store.transaction((tx) => this.applyCompletion(tx, payment, gatewayPaymentId));
    } catch (error) {
      if (!(error instanceof DuplicateKeyError)) throw error;
      Logger.debug('Concurrent payment completion, retrying', { paymentId: payment.id, index: error.index });
      return this.store.transaction((tx) => this.applyCompletion(tx, payment, gatewayPaymentId));
    }
  }

  private async applyCompletion(
    tx: Repositories,
    payment: PaymentRecord,
    gatewayPaymentId: string
  ): Promise<CompletionOutcome> {
    await tx.payments.updateStatus(
      payment.id,
      PaymentStatus.COMPLETED,
      JSON.stringify({ paymentId: gatewayPaymentId })
    );

    if (payment.courseId) {
      const { enrollment, created } = await this.ledger.ensure(tx, payment.userId, payment.courseId);
      return { kind: 'course', courseId: payment.courseId, enrollmentId: enrollment.id, created };
    }

    if (payment.eventId) {
      const existing = await tx.registrations.findByUserAndEvent(payment.userId, payment.eventId);
      if (existing) {
        return { kind: 'event', eventId: payment.eventId, registrationId: existing.id, created: false };
      }

      const event = await tx.events.findById(payment.eventId);
      if (!event) throw new NotFoundError('Event not found');
      if (!(await tx.events.reserveSeat(event.id))) {
        throw new ConflictError('Event is full', 'EVENT_FULL');
      }

      const registration = await tx.registrations.insert({
        userId: payment.userId,
        eventId: event.id,
        status: RegistrationStatus.CONFIRMED,
        registeredAt: this.now(),
      });
      return { kind: 'event', eventId: event.id, registrationId: registration.id, created: true };
    }

    throw new PreconditionFailedError('Payment references neither a course nor an event');
  }

  /** Records the failure unless the payment already settled. The original error is re-thrown by the caller. */
  private async markFailed(payment: PaymentRecord, cause: unknown): Promise<void> {
    try {
      const current = await this.store.payments.findByTransactionId(payment.transactionId);
      if (current?.status === PaymentStatus.COMPLETED) return;

      await this.store.payments.updateStatus(
        payment.id,
        PaymentStatus.FAILED,
        JSON.stringify({ error: errorMessage(cause) })
      );
      Logger.warning('Payment marked failed', { paymentId: payment.id, reason: errorMessage(cause) });
    } catch (error) {
      Logger.error('Could not mark payment failed', errorMessage(error));
    }
  }

  private async notifyEnrollment(userId: string, courseId: string): Promise<void> {
    const [user, course] = await Promise.all([
      this.store.users.findById(userId),
      this.store.courses.findById(courseId),
    ]);
    if (!user?.phone || !course) return;

    await this.notifier.send(user.phone, 'enrollment', {
      userName: user.name,
      courseTitle: course.title,
      dashboardLink: this.options.dashboardUrl,
    });
  }
}
