import { FastifyInstance } from 'fastify';
import contentEndpoints from './content';
import searchEndpoint from './search';
import analyticsEndpoints from './analytics';
import adminEndpoints from './admin';
import { RouteOptions } from './options';

export default async function constitutionRoutes(fastify: FastifyInstance, opts: RouteOptions) {
  // Only the context is passed on; the prefix this plugin was registered with already applies.
  const { ctx } = opts;
  await fastify.register(contentEndpoints, { ctx });
  await fastify.register(searchEndpoint, { ctx });
  await fastify.register(analyticsEndpoints, { ctx });
  await fastify.register(adminEndpoints, { ctx, prefix: '/admin' });
}
