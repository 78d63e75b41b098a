import type { MetricsRegistry } from '../infrastructure/metrics';
import { LatencySimulator, type LatencyRange, type RandomSource } from '../utils/latency';
import { BusinessMetrics } from './businessMetrics';
import { OrderService } from './orderService';
import { PaymentService } from './paymentService';
import { UserService } from './userService';

export { BusinessMetrics } from './businessMetrics';
export { UserService, type User, type CreateUserInput } from './userService';
export { OrderService, type Order, type CreateOrderInput } from './orderService';
export { PaymentService, type Payment, type ProcessPaymentInput } from './paymentService';

export interface Services {
  users: UserService;
  orders: OrderService;
  payments: PaymentService;
}

export interface ServicesOptions {
  registry: MetricsRegistry;
  metricsPrefix?: string;
  latency: LatencyRange;
  paymentFailureRate: number;
  random?: RandomSource;
}

export function createServices(options: ServicesOptions): Services {
  const latency = new LatencySimulator(options.latency, options.random);
  const metrics = new BusinessMetrics(options.registry, options.metricsPrefix);
  const users = new UserService(latency, metrics);
  const orders = new OrderService(latency, metrics, users);
  const payments = new PaymentService(latency, metrics, orders, {
    failureRate: options.paymentFailureRate,
    random: options.random,
  });
  return { users, orders, payments };
}
