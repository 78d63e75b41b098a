import type { Request, Response } from 'express';
import type { CreateOrderInput, OrderService } from '../services';
import { listOrdersQuerySchema, orderIdParamsSchema } from './schemas';

export function createOrderController(orders: OrderService) {
  return {
    async listOrders(req: Request, res: Response): Promise<void> {
      const { userId } = listOrdersQuerySchema.parse(req.query);
      const list = await orders.listOrders(userId);
      res.json({ orders: list, total: list.length });
    },

    async getOrder(req: Request, res: Response): Promise<void> {
      const { orderId } = orderIdParamsSchema.parse(req.params);
      res.json(await orders.getOrder(orderId));
    },

    async createOrder(req: Request, res: Response): Promise<void> {
      const input: CreateOrderInput = req.body;
      res.status(201).json(await orders.createOrder(input));
    },

    async processOrder(req: Request, res: Response): Promise<void> {
      const { orderId } = orderIdParamsSchema.parse(req.params);
      res.json(await orders.processOrder(orderId));
    },

    async completeOrder(req: Request, res: Response): Promise<void> {
      const { orderId } = orderIdParamsSchema.parse(req.params);
      res.json(await orders.completeOrder(orderId));
    },

    async cancelOrder(req: Request, res: Response): Promise<void> {
      const { orderId } = orderIdParamsSchema.parse(req.params);
      res.json(await orders.cancelOrder(orderId));
    },
  };
}
