/**
 * Payment Service
 *
 * Simulated card processor: fee is 2.9 % + 0.30, and a configurable share
 * of payments is declined.
 */

import { AppError } from '../errors';
import type { LatencySimulator, RandomSource } from '../utils/latency';
import type { BusinessMetrics } from './businessMetrics';
import type { OrderService } from './orderService';

export type PaymentMethod = 'credit_card' | 'debit_card' | 'paypal' | 'bank_transfer';

export interface Payment {
  id: number;
  orderId: number;
  amount: number;
  method: PaymentMethod;
  status: 'completed';
  processingFee: number;
  netAmount: number;
  createdAt: string;
}

export interface ProcessPaymentInput {
  orderId: number;
  amount: number;
  method: PaymentMethod;
}

export interface PaymentServiceOptions {
  /** Probability in [0, 1] that a payment is declined. */
  failureRate: number;
  random?: RandomSource;
}

const FEE_RATE = 0.029;
const FEE_FIXED = 0.3;

export function roundCurrency(value: number): number {
  return Math.round(value * 100) / 100;
}

export function processingFeeFor(amount: number): number {
  return roundCurrency(amount * FEE_RATE + FEE_FIXED);
}

export class PaymentService {
  private readonly payments = new Map<number, Payment>();
  private nextId = 1;
  private readonly random: RandomSource;

  constructor(
    private readonly latency: LatencySimulator,
    private readonly metrics: BusinessMetrics,
    private readonly orders: OrderService,
    private readonly options: PaymentServiceOptions,
  ) {
    this.random = options.random ?? Math.random;
  }

  processPayment(input: ProcessPaymentInput): Promise<Payment> {
    return this.metrics.track('process_payment', async () => {
      const order = await this.orders.getOrder(input.orderId).catch((error: unknown) => {
        if (AppError.isAppError(error) && error.statusCode === 404) {
          throw AppError.badRequest(`Order ${input.orderId} does not exist`, { orderId: input.orderId });
        }
        throw error;
      });
      if (roundCurrency(order.amount) !== roundCurrency(input.amount)) {
        throw AppError.badRequest(`Amount ${input.amount} does not match order total ${order.amount}`, {
          orderId: order.id,
        });
      }

      await this.latency.wait();
      if (this.random() < this.options.failureRate) {
        throw AppError.paymentRequired(`Payment for order ${order.id} was declined`, { orderId: order.id });
      }

      const processingFee = processingFeeFor(input.amount);
      const payment: Payment = {
        id: this.nextId++,
        orderId: order.id,
        amount: input.amount,
        method: input.method,
        status: 'completed',
        processingFee,
        netAmount: roundCurrency(input.amount - processingFee),
        createdAt: new Date().toISOString(),
      };
      this.payments.set(payment.id, payment);
      return payment;
    });
  }

  getPayment(paymentId: number): Promise<Payment> {
    return this.metrics.track('get_payment', async () => {
      await this.latency.wait();
      const payment = this.payments.get(paymentId);
      if (!payment) {
        throw AppError.notFound(`Payment ${paymentId} not found`);
      }
      return payment;
    });
  }
}
