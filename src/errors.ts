/**
 * Error thrown when a retry session is abandoned through its AbortSignal.
 * The abort reason is available as `cause`.
 */
export class RetryCancelledError extends Error {
  constructor(reason?: unknown, message: string = 'Retry cancelled') {
    super(message, { cause: reason });
    this.name = 'RetryCancelledError';
  }
}

/**
 * Extract a numeric status code from an error.
 *
 * Looks at `response.status` (axios style), `statusCode`, `status` and `code`
 * in that order, then follows `cause`.
 */
export function getErrorCode(error: unknown): number | undefined {
  return extractCode(error, 0);
}

// Bounds cause chains which refer back to themselves
const MAX_CAUSE_DEPTH = 8;

function extractCode(error: unknown, depth: number): number | undefined {
  if (!isRecord(error) || depth > MAX_CAUSE_DEPTH) {
    return undefined;
  }

  const response = error.response;
  if (isRecord(response) && typeof response.status === 'number') {
    return response.status;
  }

  if (typeof error.statusCode === 'number') {
    return error.statusCode;
  }

  if (typeof error.status === 'number') {
    return error.status;
  }

  if (typeof error.code === 'number') {
    return error.code;
  }

  if (error.cause !== undefined) {
    return extractCode(error.cause, depth + 1);
  }

  return undefined;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}
