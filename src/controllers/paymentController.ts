import type { Request, Response } from 'express';
import type { PaymentService, ProcessPaymentInput } from '../services';
import { paymentIdParamsSchema } from './schemas';

export function createPaymentController(payments: PaymentService) {
  return {
    async processPayment(req: Request, res: Response): Promise<void> {
      const input: ProcessPaymentInput = req.body;
      res.status(201).json(await payments.processPayment(input));
    },

    async getPayment(req: Request, res: Response): Promise<void> {
      const { paymentId } = paymentIdParamsSchema.parse(req.params);
      res.json(await payments.getPayment(paymentId));
    },
  };
}
