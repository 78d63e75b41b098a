/**
 * Order Service
 *
 * Orders move pending → processing → completed; cancellation is only
 * possible while pending.
 */

import { AppError } from '../errors';
import type { LatencySimulator } from '../utils/latency';
import type { BusinessMetrics } from './businessMetrics';
import type { UserService } from './userService';

export type OrderStatus = 'pending' | 'processing' | 'completed' | 'cancelled';

export interface Order {
  id: number;
  userId: number;
  amount: number;
  items: string[];
  status: OrderStatus;
  createdAt: string;
  updatedAt: string;
}

export interface CreateOrderInput {
  userId: number;
  amount: number;
  items: string[];
}

export class OrderService {
  private readonly orders = new Map<number, Order>();
  private nextId = 1;

  constructor(
    private readonly latency: LatencySimulator,
    private readonly metrics: BusinessMetrics,
    private readonly users: UserService,
  ) {}

  listOrders(userId?: number): Promise<Order[]> {
    return this.metrics.track('list_orders', async () => {
      await this.latency.wait();
      const orders = [...this.orders.values()];
      return userId === undefined ? orders : orders.filter((order) => order.userId === userId);
    });
  }

  getOrder(orderId: number): Promise<Order> {
    return this.metrics.track('get_order', async () => {
      await this.latency.wait();
      return this.require(orderId);
    });
  }

  createOrder(input: CreateOrderInput): Promise<Order> {
    return this.metrics.track('create_order', async () => {
      if (!(await this.users.userExists(input.userId))) {
        throw AppError.badRequest(`User ${input.userId} does not exist`, { userId: input.userId });
      }
      await this.latency.wait();
      const now = new Date().toISOString();
      const order: Order = {
        id: this.nextId++,
        userId: input.userId,
        amount: input.amount,
        items: [...input.items],
        status: 'pending',
        createdAt: now,
        updatedAt: now,
      };
      this.orders.set(order.id, order);
      return order;
    });
  }

  processOrder(orderId: number): Promise<Order> {
    return this.metrics.track('process_order', async () => {
      await this.latency.wait();
      return this.transition(orderId, 'pending', 'processing');
    });
  }

  completeOrder(orderId: number): Promise<Order> {
    return this.metrics.track('complete_order', async () => {
      await this.latency.wait();
      return this.transition(orderId, 'processing', 'completed');
    });
  }

  cancelOrder(orderId: number): Promise<Order> {
    return this.metrics.track('cancel_order', async () => {
      await this.latency.wait();
      return this.transition(orderId, 'pending', 'cancelled');
    });
  }

  private require(orderId: number): Order {
    const order = this.orders.get(orderId);
    if (!order) {
      throw AppError.notFound(`Order ${orderId} not found`);
    }
    return order;
  }

  private transition(orderId: number, from: OrderStatus, to: OrderStatus): Order {
    const order = this.require(orderId);
    if (order.status !== from) {
      throw AppError.conflict(`Order ${orderId} is ${order.status}, expected ${from}`, {
        orderId,
        status: order.status,
      });
    }
    order.status = to;
    order.updatedAt = new Date().toISOString();
    return order;
  }
}
