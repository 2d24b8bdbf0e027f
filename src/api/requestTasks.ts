import { FastifyRequest } from 'fastify';
import { BackgroundTasks } from '../services/backgroundTasks';

const queues = new WeakMap<FastifyRequest, BackgroundTasks>();

/** Queue of work to run once the reply for `request` has been sent. */
export function tasksFor(request: FastifyRequest): BackgroundTasks {
  let queue = queues.get(request);
  if (!queue) {
    queue = new BackgroundTasks(request.log);
    queues.set(request, queue);
  }
  return queue;
}

export async function drainTasks(request: FastifyRequest): Promise<void> {
  const queue = queues.get(request);
  if (!queue) return;
  queues.delete(request);
  await queue.run();
}
