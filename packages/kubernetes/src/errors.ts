/**
 * Mapping of client failures onto the seqctl error taxonomy
 */

import { ApplyError, TransportError, type ResourceFailure } from '@seqctl/shared';

// Status codes worth retrying: request timeout, throttling, server side trouble
const TRANSIENT_STATUS_CODES = new Set([408, 429, 500, 502, 503, 504]);

// Raised by KubernetesObjectApi discovery when a kind is not served by the cluster
const UNKNOWN_KIND_PREFIX = 'Unrecognized API version and kind';

export function getStatusCode(error: unknown): number | undefined {
  if (
    typeof error === 'object' &&
    error !== null &&
    'statusCode' in error &&
    typeof error.statusCode === 'number'
  ) {
    return error.statusCode;
  }
  return undefined;
}

export function isNotFound(error: unknown): boolean {
  return getStatusCode(error) === 404;
}

/**
 * Prefer the API server's Status message over the client's generic one
 */
export function describeClusterError(error: unknown): string {
  if (typeof error === 'object' && error !== null && 'body' in error) {
    const body = error.body;
    if (typeof body === 'object' && body !== null && 'message' in body && typeof body.message === 'string') {
      return body.message;
    }
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

export function isTransientClusterError(error: unknown): boolean {
  if (error instanceof TransportError) {
    return true;
  }
  if (error instanceof ApplyError) {
    return false;
  }
  const statusCode = getStatusCode(error);
  if (statusCode !== undefined) {
    return TRANSIENT_STATUS_CODES.has(statusCode);
  }
  if (error instanceof Error && error.message.startsWith(UNKNOWN_KIND_PREFIX)) {
    return false;
  }
  // No HTTP response at all: the request never made it
  return true;
}

/**
 * Classify a failure of a single document
 */
export function classifyClusterError(
  error: unknown,
  resource?: Omit<ResourceFailure, 'message' | 'statusCode'>
): TransportError | ApplyError {
  if (error instanceof TransportError || error instanceof ApplyError) {
    return error;
  }

  const statusCode = getStatusCode(error);
  const message = describeClusterError(error);

  if (isTransientClusterError(error)) {
    return new TransportError(message, statusCode, { resource: resource?.name });
  }

  return new ApplyError(message, resource ? [{ ...resource, statusCode, message }] : []);
}
