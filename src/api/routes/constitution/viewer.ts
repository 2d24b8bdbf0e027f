import { FastifyRequest } from 'fastify';
import { Viewer } from '../../../services/searchEngine';

function header(request: FastifyRequest, name: string): string | undefined {
  const value = request.headers[name];
  return typeof value === 'string' && value.trim() !== '' ? value.trim() : undefined;
}

/** Who is reading. Authentication happens upstream; the user id arrives as a header. */
export function viewerOf(request: FastifyRequest): Viewer {
  return {
    userId: header(request, 'x-user-id'),
    deviceType: header(request, 'x-device-type'),
    ipAddress: request.ip,
  };
}
