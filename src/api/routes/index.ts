import { FastifyInstance } from 'fastify';
import { AppContext } from '../../app';
import constitutionRoutes from './constitution';

export default async function (fastify: FastifyInstance, opts: { ctx: AppContext }) {
  await fastify.register(constitutionRoutes, { prefix: '/api/constitution', ctx: opts.ctx });
}
