import path from 'path';
import swaggerJsdoc from 'swagger-jsdoc';

const errorSchema = {
  type: 'object',
  properties: {
    error: {
      type: 'object',
      properties: {
        code: { type: 'string', example: 'SERVER_NOT_FOUND' },
        message: { type: 'string', example: 'Server 7 not found' },
        statusCode: { type: 'integer', example: 400 },
        timestamp: { type: 'string', format: 'date-time' },
        path: { type: 'string', example: '/wake/7' },
      },
    },
  },
};

const options: swaggerJsdoc.Options = {
  definition: {
    openapi: '3.0.0',
    info: {
      title: 'WoL Gateway API',
      version: '1.0.0',
      description:
        'Wakes servers with Wake-on-LAN magic packets, reports when they finish booting and redirects to their service',
      license: {
        name: 'Apache 2.0',
        url: 'https://www.apache.org/licenses/LICENSE-2.0.html',
      },
    },
    servers: [
      {
        url: 'http://{host}:{port}',
        description: 'Gateway (port comes from the registry document)',
        variables: {
          host: {
            default: 'localhost',
            description: 'Server hostname',
          },
          port: {
            default: '5000',
            description: 'Server port',
          },
        },
      },
    ],
    tags: [
      {
        name: 'Gateway',
        description: 'Wake, readiness polling and landing endpoints',
      },
      {
        name: 'Health',
        description: 'Service health and status endpoints',
      },
      {
        name: 'Admin',
        description: 'Server and admin user management (requires ADMIN_ENABLED and a login)',
      },
    ],
    components: {
      securitySchemes: {
        sessionCookie: {
          type: 'apiKey',
          in: 'cookie',
          name: 'wol_gateway.sid',
          description: 'Session cookie set by POST /admin/login',
        },
      },
      schemas: {
        Error: errorSchema,
        Server: {
          type: 'object',
          properties: {
            id: { type: 'integer', example: 0 },
            name: { type: 'string', example: 'Game server' },
            macAddress: { type: 'string', example: '00:11:22:33:44:55' },
            broadcastAddress: { type: 'string', example: '255.255.255.255' },
            redirectUrl: { type: 'string', example: 'http://panel.lan' },
            waitSeconds: { type: 'integer', example: 60 },
            monitorAddress: { type: 'string', example: '192.168.1.20' },
            monitorPort: { type: 'integer', example: 22 },
            locked: { type: 'boolean', example: false },
            bootHistory: { type: 'array', items: { type: 'integer' }, example: [41, 45] },
          },
        },
        ServerInput: {
          type: 'object',
          required: ['name', 'macAddress', 'redirectUrl'],
          properties: {
            name: { type: 'string', example: 'Game server' },
            macAddress: { type: 'string', example: '00:11:22:33:44:55' },
            broadcastAddress: { type: 'string', example: '255.255.255.255' },
            redirectUrl: { type: 'string', example: 'panel.lan:8080' },
            waitSeconds: { type: 'integer', example: 60 },
            monitorAddress: { type: 'string', example: '192.168.1.20' },
            monitorPort: { type: 'integer', example: 22 },
            locked: { type: 'boolean', example: true },
            pin: { type: 'string', example: '1234' },
          },
        },
        AdminUser: {
          type: 'object',
          properties: {
            username: { type: 'string', example: 'admin' },
            totpEnabled: { type: 'boolean', example: false },
            createdAt: { type: 'string', format: 'date-time' },
          },
        },
      },
      responses: {
        BadRequest: {
          description: 'Invalid request or unknown server',
          content: { 'application/json': { schema: { $ref: '#/components/schemas/Error' } } },
        },
        Unauthorized: {
          description: 'Not logged in',
          content: { 'application/json': { schema: { $ref: '#/components/schemas/Error' } } },
        },
        Forbidden: {
          description: 'Admin panel disabled or server locked',
          content: { 'application/json': { schema: { $ref: '#/components/schemas/Error' } } },
        },
        NotFound: {
          description: 'Resource not found',
          content: { 'application/json': { schema: { $ref: '#/components/schemas/Error' } } },
        },
        InternalError: {
          description: 'Internal server error',
          content: { 'application/json': { schema: { $ref: '#/components/schemas/Error' } } },
        },
      },
    },
  },
  apis: [path.join(__dirname, 'controllers', '*.{ts,js}')],
};

export const specs = swaggerJsdoc(options);
