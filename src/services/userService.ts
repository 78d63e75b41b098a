/**
 * User Service
 *
 * In-memory user store behind simulated I/O latency.
 */

import { AppError } from '../errors';
import type { LatencySimulator } from '../utils/latency';
import type { BusinessMetrics } from './businessMetrics';

export type UserStatus = 'active' | 'inactive';

export interface User {
  id: number;
  name: string;
  email: string;
  status: UserStatus;
  createdAt: string;
  updatedAt: string;
}

export interface CreateUserInput {
  name: string;
  email: string;
  status?: UserStatus;
}

const SEED_USERS: ReadonlyArray<Pick<User, 'name' | 'email'>> = [
  { name: 'Alice Example', email: 'alice@example.com' },
  { name: 'Bob Example', email: 'bob@example.com' },
  { name: 'Carol Example', email: 'carol@example.com' },
];

export class UserService {
  private readonly users = new Map<number, User>();
  private nextId = 1;

  constructor(
    private readonly latency: LatencySimulator,
    private readonly metrics: BusinessMetrics,
    seed: boolean = true,
  ) {
    if (seed) {
      const now = new Date().toISOString();
      for (const user of SEED_USERS) {
        this.insert({ ...user, status: 'active' }, now);
      }
    }
  }

  listUsers(): Promise<User[]> {
    return this.metrics.track('list_users', async () => {
      await this.latency.wait();
      return [...this.users.values()];
    });
  }

  getUser(userId: number): Promise<User> {
    return this.metrics.track('get_user', async () => {
      await this.latency.wait();
      const user = this.users.get(userId);
      if (!user) {
        throw AppError.notFound(`User ${userId} not found`);
      }
      return user;
    });
  }

  createUser(input: CreateUserInput): Promise<User> {
    return this.metrics.track('create_user', async () => {
      await this.latency.wait();
      const email = input.email.toLowerCase();
      for (const existing of this.users.values()) {
        if (existing.email === email) {
          throw AppError.conflict(`User with email ${email} already exists`);
        }
      }
      return this.insert({ name: input.name, email, status: input.status ?? 'active' }, new Date().toISOString());
    });
  }

  deleteUser(userId: number): Promise<void> {
    return this.metrics.track('delete_user', async () => {
      await this.latency.wait();
      if (!this.users.delete(userId)) {
        throw AppError.notFound(`User ${userId} not found`);
      }
    });
  }

  /** Lookup used by other services; never throws for a missing user. */
  async userExists(userId: number): Promise<boolean> {
    await this.latency.wait();
    return this.users.has(userId);
  }

  private insert(fields: Pick<User, 'name' | 'email' | 'status'>, timestamp: string): User {
    const user: User = { id: this.nextId++, ...fields, createdAt: timestamp, updatedAt: timestamp };
    this.users.set(user.id, user);
    return user;
  }
}
