import { STATUS_CODES } from 'http';
import { FastifyReply } from 'fastify';
import { Type } from '@sinclair/typebox';
import { ContentError, ContentErrorKind } from '../../../types/errors';

export const ErrorResponseSchema = Type.Object({
  statusCode: Type.Number(),
  error: Type.String(),
  message: Type.String(),
});

const STATUS_BY_KIND: Record<ContentErrorKind, number> = {
  NotFound: 404,
  InvalidQuery: 400,
  SourceUnavailable: 503,
};

export const errorResponses = {
  400: ErrorResponseSchema,
  404: ErrorResponseSchema,
  500: ErrorResponseSchema,
  503: ErrorResponseSchema,
};

export function errorBody(statusCode: number, message: string) {
  return { statusCode, error: STATUS_CODES[statusCode] ?? 'Error', message };
}

export function sendContentError(reply: FastifyReply, error: ContentError) {
  const statusCode = STATUS_BY_KIND[error.kind];
  return reply.status(statusCode).send(errorBody(statusCode, error.message));
}
