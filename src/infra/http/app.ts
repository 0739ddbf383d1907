import express from 'express';
import type { UserRepository } from '../../application/users/ports.js';
import { createHealthRoutes } from './routes/health.js';
import { createUserRoutes } from './routes/users.js';
import { createSwaggerRoutes } from './routes/swagger.js';
import { errorHandler, notFoundHandler } from './middleware/errorHandler.js';
import { createApiRateLimiter } from './middleware/rateLimit.js';

export interface AppDependencies {
  users: UserRepository;
  pingDatabase: () => Promise<void>;
  rateLimitPerMinute: number;
}

export function createApp(deps: AppDependencies): express.Express {
  const app = express();

  // Middleware
  app.use(express.json());
  app.use(createApiRateLimiter(deps.rateLimitPerMinute));

  // Health check endpoint
  app.use(createHealthRoutes(deps.pingDatabase));

  // Swagger/OpenAPI docs
  app.use(createSwaggerRoutes());

  app.use('/users', createUserRoutes(deps.users));

  // Unmatched routes
  app.use(notFoundHandler);

  // Error handler (must be last)
  app.use(errorHandler);

  return app;
}
