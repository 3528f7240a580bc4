/**
 * Log Formatting
 *
 * Log formatters and secret redaction utilities
 */

import * as winston from 'winston';
import { currentCorrelationId } from './context.js';

// Key-based matching
const SECRET_PATTERNS = [
  /authorization/i,
  /set-cookie/i,
  /api[-_]?key/i,
  /token/i,
  /secret/i,
  /password/i,
  /bearer/i,
];

// Chapter bodies can be large; never write them to the log stream
const CONTENT_FIELDS = ['content', 'html', 'chapterContent'];

/**
 * Redacts secrets and chapter content from objects
 */
export function maskSecrets(obj: unknown, maxDepth = 3): unknown {
  if (maxDepth <= 0 || obj === null || typeof obj !== 'object') {
    return obj;
  }

  if (Array.isArray(obj)) {
    return obj.map(item => maskSecrets(item, maxDepth - 1));
  }

  const masked: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    if (SECRET_PATTERNS.some(pattern => pattern.test(key))) {
      masked[key] = '[REDACTED]';
    } else if (CONTENT_FIELDS.includes(key) && typeof value === 'string') {
      masked[key] = `[CONTENT ${value.length} chars]`;
    } else if (typeof value === 'object' && value !== null) {
      masked[key] = maskSecrets(value, maxDepth - 1);
    } else {
      masked[key] = value;
    }
  }

  return masked;
}

/**
 * Safe JSON stringification with size limits
 */
export function safeStringify(obj: unknown, maxSize = 10000): string {
  try {
    const str = JSON.stringify(maskSecrets(obj));
    return str.length > maxSize ? str.substring(0, maxSize) + '...[TRUNCATED]' : str;
  } catch {
    return '[CIRCULAR_OR_INVALID_JSON]';
  }
}

/**
 * Development console format
 */
export function createDevFormat(): winston.Logform.Format {
  return winston.format.combine(
    winston.format.timestamp({ format: 'HH:mm:ss' }),
    winston.format.colorize(),
    winston.format.printf(({ timestamp, level, message, service, correlationId, module: moduleCtx, ...meta }) => {
      const finalCorrelationId = correlationId || currentCorrelationId();

      const correlation = finalCorrelationId ? ` [${String(finalCorrelationId).slice(0, 8)}]` : '';
      const moduleInfo = moduleCtx ? ` ${String(moduleCtx)}` : '';
      const serviceInfo = service ? `[${String(service)}]` : '';
      const metaStr = Object.keys(meta).length > 0 ? ` ${safeStringify(meta, 1000)}` : '';

      return `${String(timestamp)} ${level}${serviceInfo}${correlation}${moduleInfo}: ${String(message)}${metaStr}`;
    })
  );
}

/**
 * Production JSON format
 */
export function createProdFormat(): winston.Logform.Format {
  return winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.printf(info => {
      if (!info.correlationId) {
        info.correlationId = currentCorrelationId();
      }
      return safeStringify(info, 50000);
    })
  );
}
