// ============================================
// src/services/paymentGateway.ts
// ============================================

import crypto from 'crypto';
import Razorpay from 'razorpay';
import { ExternalServiceError, PaymentVerificationError } from '../utils/errors';

export interface CreateOrderInput {
  /** Amount in major currency units. */
  amount: number;
  currency: string;
  receipt: string;
}

export interface GatewayOrder {
  id: string;
  amount: number;
  currency: string;
}

export interface PaymentVerification {
  orderId: string;
  paymentId: string;
  signature: string;
}

export interface PaymentGateway {
  /** Public key handed to the checkout client. */
  readonly keyId: string;
  createOrder(input: CreateOrderInput): Promise<GatewayOrder>;
  /** Rejects with PaymentVerificationError when the signature does not match. */
  verifyPayment(verification: PaymentVerification): Promise<void>;
}

export const signPayment = (secret: string, orderId: string, paymentId: string): string =>
  crypto.createHmac('sha256', secret).update(`${orderId}|${paymentId}`).digest('hex');

interface RazorpayOptions {
  keyId: string;
  keySecret: string;
}

export class RazorpayGateway implements PaymentGateway {
  private client: Razorpay | null = null;

  constructor(private readonly options: RazorpayOptions) {}

  get keyId(): string {
    return this.options.keyId;
  }

  async createOrder({ amount, currency, receipt }: CreateOrderInput): Promise<GatewayOrder> {
    const order = await this.getClient().orders.create({
      amount: Math.round(amount * 100), // paise
      currency,
      receipt,
    });

    return {
      id: order.id,
      amount: Number(order.amount) / 100,
      currency: order.currency,
    };
  }

  async verifyPayment({ orderId, paymentId, signature }: PaymentVerification): Promise<void> {
    const expected = Buffer.from(signPayment(this.options.keySecret, orderId, paymentId));
    const received = Buffer.from(signature);

    if (expected.length !== received.length || !crypto.timingSafeEqual(expected, received)) {
      throw new PaymentVerificationError('Invalid payment signature');
    }
  }

  private getClient(): Razorpay {
    if (!this.options.keyId || !this.options.keySecret) {
      throw new ExternalServiceError('razorpay', 'Payment gateway is not configured');
    }
    if (!this.client) {
      this.client = new Razorpay({ key_id: this.options.keyId, key_secret: this.options.keySecret });
    }
    return this.client;
  }
}
