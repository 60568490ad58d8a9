import swaggerJsdoc from 'swagger-jsdoc';

const options: swaggerJsdoc.Options = {
  definition: {
    openapi: '3.0.0',
    info: {
      title: 'NUGAMOTO API',
      version: '1.0.0',
      description: 'Kitchens, memberships and recipes behind stateless JWT authentication',
    },
    servers: [
      {
        url: 'http://localhost:3000',
        description: 'Development server',
      },
    ],
    components: {
      securitySchemes: {
        bearerAuth: {
          type: 'http',
          scheme: 'bearer',
          bearerFormat: 'JWT',
        },
      },
      schemas: {
        ErrorResponse: {
          type: 'object',
          required: ['code', 'message'],
          properties: {
            code: {
              type: 'string',
              description: 'Error code identifier',
              example: 'TOKEN_EXPIRED',
            },
            message: {
              type: 'string',
              description: 'Human-readable error message',
              example: 'Invalid or expired token',
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
      { name: 'Auth', description: 'Registration, login and token refresh' },
      { name: 'Users', description: 'Profiles' },
      { name: 'Kitchens', description: 'Kitchens and their members' },
      { name: 'Recipes', description: 'Recipes and their owners' },
    ],
  },
  apis: ['./src/infra/http/routes/*.ts'],
};

export const swaggerSpec = swaggerJsdoc(options);

