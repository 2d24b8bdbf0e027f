import Fastify, { FastifyError, FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import swagger from '@fastify/swagger';
import swaggerUI from '@fastify/swagger-ui';
import config from '../config/config';
import { AppContext } from '../app';
import { drainTasks } from './requestTasks';
import routes from './routes';
import { errorBody } from './routes/constitution/errors';

export interface ServerOptions {
  logLevel?: string;
  /** Disable request logging entirely (tests). */
  quiet?: boolean;
}

export async function createServer(ctx: AppContext, options: ServerOptions = {}): Promise<FastifyInstance> {
  const server = Fastify({
    logger: options.quiet
      ? false
      : {
          level: options.logLevel ?? config.logLevel,
          transport: config.nodeEnv === 'development' ? { target: 'pino-pretty' } : undefined,
        },
  });

  // Register plugins
  await server.register(cors, {
    origin: true,
  });

  // Register Swagger
  await server.register(swagger, {
    swagger: {
      info: {
        title: 'Constitution Reader API',
        description: 'Read, search and track views of the constitution text',
        version: '1.0.0',
      },

      schemes: ['http', 'https'],
      consumes: ['application/json'],
      produces: ['application/json'],
    },
  });

  await server.register(swaggerUI, {
    routePrefix: '/documentation',
  });

  // Deferred cache writes and view tracking run after the reply is flushed.
  server.addHook('onResponse', async request => {
    await drainTasks(request);
  });

  server.setErrorHandler((error: FastifyError, request, reply) => {
    const statusCode = error.statusCode ?? 500;
    if (statusCode >= 500) {
      request.log.error({ err: error }, 'Unhandled error');
      return reply.status(statusCode).send(errorBody(statusCode, 'An unexpected error occurred'));
    }
    return reply.status(statusCode).send(errorBody(statusCode, error.message));
  });

  // Register routes
  await server.register(routes, { ctx });

  // Health check endpoint
  server.get('/health', async () => {
    return { status: 'ok', timestamp: new Date().toISOString() };
  });

  return server;
}
