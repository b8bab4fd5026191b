import { Request, Response, NextFunction } from 'express';
import { AppError, ValidationError } from '@/errors';
import { logger } from '@/adapters/logging/LoggerFactory';
import { env } from '@/config/env';

const SENSITIVE_FIELDS = new Set(['appKey', 'appSecret', 'accountNumber']);

/**
 * Copy of a request body with KIS credentials redacted, for logging
 */
export function sanitizeRequestBody(body: unknown): unknown {
  if (Array.isArray(body)) {
    return body.map(sanitizeRequestBody);
  }
  if (!body || typeof body !== 'object') {
    return body;
  }

  const sanitized: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(body)) {
    sanitized[key] = SENSITIVE_FIELDS.has(key) ? '[REDACTED]' : sanitizeRequestBody(value);
  }
  return sanitized;
}

/**
 * Outside production, messages are returned as-is. In production, messages
 * that mention upstream or internal details are replaced with a generic one.
 */
function sanitizeErrorMessage(message: string): string {
  if (env.NODE_ENV !== 'production') {
    return message;
  }

  const sensitivePatterns = [
    /token|credential|secret|appkey/i, // Upstream auth details
    /koreainvestment|openapi|status \d{3}/i, // Upstream endpoint details
    /file|path|directory/i,
    /internal|implementation/i,
  ];

  if (sensitivePatterns.some((pattern) => pattern.test(message))) {
    return 'An error occurred while processing your request';
  }

  return message;
}

/**
 * Client status carried by body-parser errors (http-errors style), if any
 */
function bodyParserStatus(err: Error): number | undefined {
  if ('status' in err && typeof err.status === 'number' && err.status >= 400 && err.status < 500) {
    return err.status;
  }
  return undefined;
}

const BODY_ERROR_MESSAGES: Record<number, string> = {
  413: 'Request body too large',
  415: 'Unsupported content type',
};

function bodyErrorMessage(err: Error, status: number): string {
  if (err instanceof SyntaxError) {
    return 'Malformed JSON body';
  }
  return BODY_ERROR_MESSAGES[status] ?? 'Invalid request body';
}

interface ErrorResponse {
  success: false;
  error: {
    message: string;
    details?: unknown;
  };
}

/**
 * Global error handler middleware
 * Handles all errors passed to next()
 */
export function errorHandler(
  err: Error,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  const bodyStatus = err instanceof AppError ? undefined : bodyParserStatus(err);
  const isClientError =
    (err instanceof AppError && err.statusCode < 500) || bodyStatus !== undefined;
  const logPayload = {
    error: {
      name: err.name,
      message: err.message,
      stack: isClientError ? undefined : err.stack,
    },
    request: {
      method: req.method,
      url: req.originalUrl,
      body: sanitizeRequestBody(req.body),
    },
  };

  if (isClientError) {
    logger.warn(logPayload, 'Request rejected');
  } else {
    logger.error(logPayload, 'Error occurred');
  }

  if (err instanceof AppError) {
    const errorResponse: ErrorResponse = {
      success: false,
      error: {
        message: sanitizeErrorMessage(err.message),
      },
    };

    if (err instanceof ValidationError && err.details) {
      errorResponse.error.details = err.details;
    }

    res.status(err.statusCode).json(errorResponse);
    return;
  }

  // express.json() rejects bad bodies with a 4xx status (400 malformed, 413 too large)
  if (bodyStatus !== undefined) {
    res.status(bodyStatus).json({ success: false, error: { message: bodyErrorMessage(err, bodyStatus) } });
    return;
  }

  res.status(500).json({
    success: false,
    error: {
      message: 'Internal server error',
    },
  });
}
