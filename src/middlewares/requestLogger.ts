import { Request, Response, NextFunction } from 'express';
import { logger } from '../utils/logger';

/**
 * Field names redacted from logged request bodies.
 */
const SENSITIVE_FIELDS = new Set([
  'password', 'token', 'secret', 'authorization',
  'access_token', 'refresh_token', 'account_number', 'code', 'state',
]);

export function sanitizeBody(body: unknown): unknown {
  if (!body || typeof body !== 'object' || Array.isArray(body)) return body;
  const sanitized: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(body)) {
    sanitized[key] = SENSITIVE_FIELDS.has(key.toLowerCase()) ? '[REDACTED]' : value;
  }
  return sanitized;
}

export const requestLogger = (req: Request, res: Response, next: NextFunction) => {
  const start = Date.now();

  logger.http(`→ ${req.method} ${req.originalUrl}`, {
    event: 'request_start',
    method: req.method,
    url: req.originalUrl,
    ip: req.ip,
    userAgent: req.get('user-agent'),
    contentType: req.get('content-type'),
    contentLength: req.get('content-length'),
    body: sanitizeBody(req.body),
  });

  res.on('finish', () => {
    const duration = Date.now() - start;
    const statusCode = res.statusCode;

    const logData = {
      event: 'request_complete',
      method: req.method,
      url: req.originalUrl,
      status: statusCode,
      durationMs: duration,
      contentLength: res.get('content-length'),
    };

    if (statusCode >= 500) {
      logger.error(`✗ ${req.method} ${req.originalUrl} ${statusCode} (${duration}ms)`, logData);
    } else if (statusCode >= 400) {
      logger.warn(`⚠ ${req.method} ${req.originalUrl} ${statusCode} (${duration}ms)`, logData);
    } else {
      logger.http(`✓ ${req.method} ${req.originalUrl} ${statusCode} (${duration}ms)`, logData);
    }
  });

  next();
};
