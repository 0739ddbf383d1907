import swaggerJsdoc from 'swagger-jsdoc';

const options: swaggerJsdoc.Options = {
  definition: {
    openapi: '3.0.0',
    info: {
      title: 'Pooled Users API',
      version: '1.0.0',
      description: 'REST API for users backed by a shared PostgreSQL connection pool',
    },
    servers: [
      {
        url: 'http://localhost:3000',
        description: 'Development server',
      },
    ],
    components: {
      schemas: {
        User: {
          type: 'object',
          required: ['id', 'name', 'email', 'createdAt'],
          properties: {
            id: { type: 'integer', example: 1 },
            name: { type: 'string', maxLength: 100, example: 'Ada' },
            email: { type: 'string', format: 'email', maxLength: 100, example: 'ada@example.com' },
            createdAt: { type: 'string', format: 'date-time' },
          },
        },
        ErrorResponse: {
          type: 'object',
          required: ['code', 'message'],
          properties: {
            code: {
              type: 'string',
              description: 'Error code identifier',
              example: 'NOT_FOUND',
            },
            message: {
              type: 'string',
              description: 'Human-readable error message',
              example: 'User 42 not found',
            },
            details: {
              type: 'object',
              description: 'Additional error details (optional)',
              additionalProperties: true,
            },
          },
        },
      },
    },
    tags: [
      { name: 'Health', description: 'Liveness and database reachability' },
      { name: 'Users', description: 'User records' },
    ],
  },
  // Sources under tsx/vitest, compiled output under node
  apis: ['./src/infra/http/routes/*.ts', './dist/infra/http/routes/*.js'],
};

export const swaggerSpec = swaggerJsdoc(options);
