/**
 * Global Fastify error handler and response helpers.
 * Maps AppError subclasses and ZodError to structured ApiResponse envelopes.
 */
import type { FastifyInstance, FastifyReply } from 'fastify';
import { ZodError } from 'zod';
import { AppError } from '@/core/errors.js';
import type { Logger } from '@/observability/logger.js';
import type { ApiResponse } from './types.js';

// ─── Response Helpers ───────────────────────────────────────────

/** Send a success response wrapped in the ApiResponse envelope. */
export async function sendSuccess(
  reply: FastifyReply,
  data: unknown,
  statusCode = 200,
): Promise<void> {
  const body: ApiResponse<unknown> = { success: true, data };
  await reply.status(statusCode).send(body);
}

/** Send an error response wrapped in the ApiResponse envelope. */
export async function sendError(
  reply: FastifyReply,
  code: string,
  message: string,
  statusCode = 500,
  details?: Record<string, unknown>,
): Promise<void> {
  const body: ApiResponse<never> = {
    success: false,
    error: { code, message, ...(details && { details }) },
  };
  await reply.status(statusCode).send(body);
}

/** Send an AppError returned through a Result. */
export async function sendAppError(reply: FastifyReply, error: AppError): Promise<void> {
  await sendError(reply, error.code, error.message, error.statusCode, error.context);
}

/** Send a 404 not-found response. */
export async function sendNotFound(
  reply: FastifyReply,
  resource: string,
  id: string,
): Promise<void> {
  await sendError(reply, 'NOT_FOUND', `${resource} "${id}" not found`, 404);
}

// ─── Global Error Handler ───────────────────────────────────────

/** Register the global Fastify error handler. */
export function registerErrorHandler(fastify: FastifyInstance, logger: Logger): void {
  fastify.setErrorHandler(async (error: unknown, _request, reply) => {
    // Zod validation errors
    if (error instanceof ZodError) {
      const details: Record<string, unknown> = {
        issues: error.issues.map((i) => ({
          path: i.path.join('.'),
          message: i.message,
        })),
      };
      await sendError(reply, 'VALIDATION_ERROR', 'Request validation failed', 400, details);
      return;
    }

    // AppError hierarchy: the error's own statusCode and code
    if (error instanceof AppError) {
      logger.warn('Request failed with AppError', {
        component: 'error-handler',
        code: error.code,
        statusCode: error.statusCode,
        message: error.message,
      });
      await sendAppError(reply, error);
      return;
    }

    // Fastify built-in errors (e.g., malformed query strings, rate limiting)
    if (error instanceof Error && 'statusCode' in error && typeof error.statusCode === 'number') {
      await sendError(reply, 'REQUEST_ERROR', error.message, error.statusCode);
      return;
    }

    // Unknown errors
    const message = error instanceof Error ? error.message : String(error);
    const stack = error instanceof Error ? error.stack : undefined;
    logger.error('Unhandled error in request', {
      component: 'error-handler',
      error: message,
      stack,
    });
    await sendError(reply, 'INTERNAL_ERROR', 'An unexpected error occurred', 500);
  });
}
