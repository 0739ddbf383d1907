import { Router } from 'express';
import { z } from 'zod';
import type { UserRepository } from '../../../application/users/ports.js';
import { UserQueries } from '../../../application/users/queries.js';
import { CreateUserUseCase } from '../../../application/users/createUser.js';
import { validate } from '../middleware/validate.js';
import { asyncHandler } from '../middleware/asyncHandler.js';

/**
 * @openapi
 * /users:
 *   get:
 *     tags: [Users]
 *     summary: List users ordered by id
 *     parameters:
 *       - in: query
 *         name: limit
 *         schema: { type: integer, minimum: 1, maximum: 100, default: 50 }
 *       - in: query
 *         name: offset
 *         schema: { type: integer, minimum: 0, maximum: 9007199254740991, default: 0 }
 *     responses:
 *       200:
 *         description: Users
 *         content:
 *           application/json:
 *             schema:
 *               type: array
 *               items: { $ref: '#/components/schemas/User' }
 *       400:
 *         description: Validation error
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *   post:
 *     tags: [Users]
 *     summary: Create a user
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required: [name, email]
 *             properties:
 *               name: { type: string, minLength: 1, maxLength: 100 }
 *               email: { type: string, format: email, maxLength: 100 }
 *     responses:
 *       201:
 *         description: User created
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/User' }
 *       400:
 *         description: Validation error
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *       409:
 *         description: Email already exists
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *
 * /users/{id}:
 *   get:
 *     tags: [Users]
 *     summary: Get a user by id
 *     parameters:
 *       - in: path
 *         name: id
 *         required: true
 *         schema: { type: integer, minimum: 1, maximum: 2147483647 }
 *     responses:
 *       200:
 *         description: User
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/User' }
 *       400:
 *         description: Validation error
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *       404:
 *         description: User not found
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 */

// users.id is SERIAL (int4)
const MAX_USER_ID = 2147483647;

const listUsersQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(100).default(50),
  offset: z.coerce.number().int().min(0).max(Number.MAX_SAFE_INTEGER).default(0),
});

const userParamsSchema = z.object({
  id: z.coerce.number().int().positive().max(MAX_USER_ID),
});

const createUserBodySchema = z.object({
  name: z.string().trim().min(1).max(100),
  email: z.string().trim().email().max(100),
});

export function createUserRoutes(userRepo: UserRepository) {
  const router = Router();
  const queries = new UserQueries(userRepo);
  const createUserUseCase = new CreateUserUseCase(userRepo);

  router.get(
    '/',
    validate({ query: listUsersQuerySchema }),
    asyncHandler(async (req, res) => {
      const page = listUsersQuerySchema.parse(req.query);
      const users = await queries.list(page);
      res.json(users);
    })
  );

  router.get(
    '/:id',
    validate({ params: userParamsSchema }),
    asyncHandler(async (req, res) => {
      const { id } = userParamsSchema.parse(req.params);
      const user = await queries.getById(id);
      res.json(user);
    })
  );

  router.post(
    '/',
    validate({ body: createUserBodySchema }),
    asyncHandler(async (req, res) => {
      const body = createUserBodySchema.parse(req.body);
      const user = await createUserUseCase.execute(body);
      res.status(201).json(user);
    })
  );

  return router;
}
