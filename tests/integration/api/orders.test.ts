/**
 * Integration Tests: Demo API
 *
 * Users, orders, payments and the demo endpoints, end to end through the
 * assembled app.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import type { Express } from 'express';
import request from 'supertest';
import { buildTestApp } from '../../helpers/app';

describe('demo API', () => {
  let app: Express;

  beforeEach(() => {
    ({ app } = buildTestApp());
  });

  describe('users', () => {
    it('lists the seeded users', async () => {
      const response = await request(app).get('/api/v1/users');

      expect(response.status).toBe(200);
      expect(response.body.total).toBe(3);
      expect(response.body.users[0]).toMatchObject({ id: 1, name: 'Alice Example' });
    });

    it('creates, validates and deletes a user', async () => {
      const created = await request(app).post('/api/v1/users').send({ name: 'Dora', email: 'dora@example.com' });
      expect(created.status).toBe(201);
      expect(created.body).toMatchObject({ id: 4, email: 'dora@example.com', status: 'active' });

      expect((await request(app).get('/api/v1/users/4/validate')).body).toEqual({ userId: 4, exists: true });
      expect((await request(app).delete('/api/v1/users/4')).status).toBe(204);
      expect((await request(app).get('/api/v1/users/4/validate')).body).toEqual({ userId: 4, exists: false });
    });

    it('rejects non-numeric ids as a validation error', async () => {
      const response = await request(app).get('/api/v1/users/abc');

      expect(response.status).toBe(400);
      expect(response.body.code).toBe('VALIDATION_ERROR');
    });
  });

  describe('orders and payments', () => {
    it('walks an order through payment and completion', async () => {
      const order = await request(app).post('/api/v1/orders').send({ userId: 2, amount: 40, items: ['lamp'] });
      expect(order.status).toBe(201);
      const orderId: number = order.body.id;

      const payment = await request(app).post('/api/v1/payments').send({ orderId, amount: 40 });
      expect(payment.status).toBe(201);
      expect(payment.body).toMatchObject({ method: 'credit_card', processingFee: 1.46, netAmount: 38.54 });

      expect((await request(app).post(`/api/v1/orders/${orderId}/process`)).body.status).toBe('processing');
      expect((await request(app).post(`/api/v1/orders/${orderId}/complete`)).body.status).toBe('completed');
      expect((await request(app).post(`/api/v1/orders/${orderId}/cancel`)).status).toBe(409);
      expect((await request(app).get(`/api/v1/payments/${payment.body.id}`)).body.orderId).toBe(orderId);
    });

    it('filters orders by user id', async () => {
      await request(app).post('/api/v1/orders').send({ userId: 1, amount: 5, items: ['a'] });
      await request(app).post('/api/v1/orders').send({ userId: 3, amount: 6, items: ['b'] });

      const response = await request(app).get('/api/v1/orders?userId=3');
      expect(response.body.total).toBe(1);
      expect(response.body.orders[0]).toMatchObject({ userId: 3, amount: 6 });
    });

    it('rejects orders for unknown users', async () => {
      const response = await request(app).post('/api/v1/orders').send({ userId: 50, amount: 5, items: ['a'] });

      expect(response.status).toBe(400);
      expect(response.body).toMatchObject({ error: 'User 50 does not exist', code: 'BAD_REQUEST' });
    });

    it('answers declined payments with 402', async () => {
      ({ app } = buildTestApp({ PAYMENT_FAILURE_RATE: 1 }, () => 0.5));
      const order = await request(app).post('/api/v1/orders').send({ userId: 1, amount: 12, items: ['a'] });

      const response = await request(app).post('/api/v1/payments').send({ orderId: order.body.id, amount: 12 });
      expect(response.status).toBe(402);
      expect(response.body.code).toBe('PAYMENT_DECLINED');
    });
  });

  describe('demo endpoints', () => {
    it('runs the full flow for an existing user', async () => {
      const response = await request(app).get('/api/v1/demo/full-flow/1');

      expect(response.status).toBe(200);
      expect(response.body).toEqual({
        flowStatus: 'completed',
        summary: {
          userId: 1,
          userName: 'Alice Example',
          orderId: 1,
          orderStatus: 'processing',
          orderAmount: 99.99,
          paymentId: 1,
          paymentStatus: 'completed',
          processingFee: 3.2,
          netAmount: 96.79,
        },
      });
    });

    it('fails the full flow for an unknown user with 404', async () => {
      expect((await request(app).get('/api/v1/demo/full-flow/404')).status).toBe(404);
    });

    it('turns an unhandled failure into a generic 500', async () => {
      const response = await request(app).get('/api/v1/demo/error');

      expect(response.status).toBe(500);
      expect(response.body).toMatchObject({ error: 'Internal server error', code: 'INTERNAL_ERROR' });
    });

    it('delays the slow endpoint by the requested time', async () => {
      const response = await request(app).get('/api/v1/demo/slow?ms=20');

      expect(response.body).toEqual({ delayedMs: 20 });
    });
  });
});
