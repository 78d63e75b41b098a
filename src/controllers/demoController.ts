/**
 * Demo Controller
 *
 * Endpoints that exercise the instrumentation: a multi-service flow, an
 * unhandled error and an artificially slow response.
 */

import type { Request, Response } from 'express';
import type { Services } from '../services';
import { sleep } from '../utils/latency';
import { slowQuerySchema, userIdParamsSchema } from './schemas';

const DEMO_ORDER = {
  amount: 99.99,
  items: ['premium_item_1', 'premium_item_2', 'bonus_item'],
};

export function createDemoController({ users, orders, payments }: Services) {
  return {
    /** user lookup → create order → pay → start processing */
    async fullFlow(req: Request, res: Response): Promise<void> {
      const { userId } = userIdParamsSchema.parse(req.params);
      const user = await users.getUser(userId);
      const order = await orders.createOrder({ userId, ...DEMO_ORDER });
      const payment = await payments.processPayment({
        orderId: order.id,
        amount: order.amount,
        method: 'credit_card',
      });
      const processed = await orders.processOrder(order.id);

      res.json({
        flowStatus: 'completed',
        summary: {
          userId: user.id,
          userName: user.name,
          orderId: processed.id,
          orderStatus: processed.status,
          orderAmount: processed.amount,
          paymentId: payment.id,
          paymentStatus: payment.status,
          processingFee: payment.processingFee,
          netAmount: payment.netAmount,
        },
      });
    },

    async fail(_req: Request, _res: Response): Promise<void> {
      throw new Error('Simulated unhandled failure');
    },

    async slow(req: Request, res: Response): Promise<void> {
      const { ms } = slowQuerySchema.parse(req.query);
      await sleep(ms);
      res.json({ delayedMs: ms });
    },
  };
}
