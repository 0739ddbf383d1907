import { Router } from 'express';
import swaggerUi from 'swagger-ui-express';
import { swaggerSpec } from '../swagger.js';

export function createSwaggerRoutes() {
  const router = Router();

  // Raw document for client generators
  router.get('/docs.json', (_req, res) => {
    res.json(swaggerSpec);
  });

  router.use('/docs', swaggerUi.serve);
  router.get('/docs', swaggerUi.setup(swaggerSpec, {
    customSiteTitle: 'Pooled Users API',
    customCss: '.swagger-ui .topbar { display: none }',
  }));

  return router;
}
