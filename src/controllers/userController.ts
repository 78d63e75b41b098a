import type { Request, Response } from 'express';
import type { CreateUserInput, UserService } from '../services';
import { userIdParamsSchema } from './schemas';

export function createUserController(users: UserService) {
  return {
    async listUsers(_req: Request, res: Response): Promise<void> {
      const list = await users.listUsers();
      res.json({ users: list, total: list.length });
    },

    async getUser(req: Request, res: Response): Promise<void> {
      const { userId } = userIdParamsSchema.parse(req.params);
      res.json(await users.getUser(userId));
    },

    async createUser(req: Request, res: Response): Promise<void> {
      const input: CreateUserInput = req.body;
      res.status(201).json(await users.createUser(input));
    },

    async deleteUser(req: Request, res: Response): Promise<void> {
      const { userId } = userIdParamsSchema.parse(req.params);
      await users.deleteUser(userId);
      res.status(204).end();
    },

    async validateUser(req: Request, res: Response): Promise<void> {
      const { userId } = userIdParamsSchema.parse(req.params);
      res.json({ userId, exists: await users.userExists(userId) });
    },
  };
}
