/**
 * Kubernetes API error helpers
 *
 * The client surfaces HTTP failures with the status code in different places
 * depending on the release (ApiException.code, statusCode, response.statusCode
 * or the Status body's code).
 */

import { isRecord } from './type-guards.js';

interface StatusBody {
  code?: number;
  message?: string;
  reason?: string;
}

function parseStatusBody(body: unknown): StatusBody | undefined {
  let value = body;
  if (typeof value === 'string') {
    try {
      value = JSON.parse(value);
    } catch {
      // Plain-text body, nothing structured to read
      return undefined;
    }
  }
  if (!isRecord(value)) {
    return undefined;
  }
  return {
    ...(typeof value.code === 'number' && { code: value.code }),
    ...(typeof value.message === 'string' && { message: value.message }),
    ...(typeof value.reason === 'string' && { reason: value.reason }),
  };
}

/**
 * Extract the HTTP status code from a Kubernetes API error
 */
export function getErrorStatusCode(error: unknown): number | undefined {
  if (!isRecord(error)) {
    return undefined;
  }

  if (typeof error.code === 'number') {
    return error.code;
  }
  if (typeof error.statusCode === 'number') {
    return error.statusCode;
  }
  if (isRecord(error.response) && typeof error.response.statusCode === 'number') {
    return error.response.statusCode;
  }
  return parseStatusBody(error.body)?.code;
}

export function isNotFoundError(error: unknown): boolean {
  return getErrorStatusCode(error) === 404;
}

export function isForbiddenError(error: unknown): boolean {
  return getErrorStatusCode(error) === 403;
}

/**
 * Format a Kubernetes API error as a single line
 */
export function formatKubernetesError(error: unknown): string {
  if (!isRecord(error)) {
    return String(error);
  }

  const statusCode = getErrorStatusCode(error);
  const status = parseStatusBody(error.body);
  const parts: string[] = [
    statusCode !== undefined ? `Kubernetes API error (${statusCode})` : 'Kubernetes API error',
  ];

  if (status?.reason) {
    parts.push(status.reason);
  }
  if (status?.message) {
    parts.push(status.message);
  } else if (typeof error.message === 'string' && error.message.length > 0) {
    parts.push(error.message);
  }

  return parts.join(': ');
}
