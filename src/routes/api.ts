import { createDemoController } from '../controllers/demoController';
import { createOrderController } from '../controllers/orderController';
import { createPaymentController } from '../controllers/paymentController';
import { createUserController } from '../controllers/userController';
import { createOrderSchema, createUserSchema, processPaymentSchema } from '../controllers/schemas';
import type { RouteDefinition } from '../infrastructure/routeMatcher';
import { validateBody } from '../middleware/validateRequest';
import type { Services } from '../services';

export const API_PREFIX = '/api/v1';

export function buildApiRoutes(services: Services): RouteDefinition[] {
  const users = createUserController(services.users);
  const orders = createOrderController(services.orders);
  const payments = createPaymentController(services.payments);
  const demo = createDemoController(services);
  const p = API_PREFIX;

  return [
    // Users
    { method: 'get', path: `${p}/users`, handlers: [users.listUsers] },
    { method: 'post', path: `${p}/users`, handlers: [validateBody(createUserSchema), users.createUser] },
    { method: 'get', path: `${p}/users/:userId`, handlers: [users.getUser] },
    { method: 'delete', path: `${p}/users/:userId`, handlers: [users.deleteUser] },
    { method: 'get', path: `${p}/users/:userId/validate`, handlers: [users.validateUser] },

    // Orders
    { method: 'get', path: `${p}/orders`, handlers: [orders.listOrders] },
    { method: 'post', path: `${p}/orders`, handlers: [validateBody(createOrderSchema), orders.createOrder] },
    { method: 'get', path: `${p}/orders/:orderId`, handlers: [orders.getOrder] },
    { method: 'post', path: `${p}/orders/:orderId/process`, handlers: [orders.processOrder] },
    { method: 'post', path: `${p}/orders/:orderId/complete`, handlers: [orders.completeOrder] },
    { method: 'post', path: `${p}/orders/:orderId/cancel`, handlers: [orders.cancelOrder] },

    // Payments
    { method: 'post', path: `${p}/payments`, handlers: [validateBody(processPaymentSchema), payments.processPayment] },
    { method: 'get', path: `${p}/payments/:paymentId`, handlers: [payments.getPayment] },

    // Demo
    { method: 'get', path: `${p}/demo/full-flow/:userId`, handlers: [demo.fullFlow] },
    { method: 'get', path: `${p}/demo/error`, handlers: [demo.fail] },
    { method: 'get', path: `${p}/demo/slow`, handlers: [demo.slow] },
  ];
}
