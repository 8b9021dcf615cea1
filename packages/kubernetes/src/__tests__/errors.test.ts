/**
 * Cluster error classification tests
 */
import { describe, it, expect } from 'vitest';
import { ApplyError, TransportError } from '@seqctl/shared';
import {
  classifyClusterError,
  describeClusterError,
  getStatusCode,
  isNotFound,
  isTransientClusterError,
} from '../errors.js';

class FakeHttpError extends Error {
  constructor(
    public statusCode: number,
    public body: unknown
  ) {
    super(`HTTP request failed`);
  }
}

const deployment = { kind: 'Deployment', name: 'backend', namespace: 'production' };

describe('getStatusCode', () => {
  it('should read a numeric statusCode', () => {
    expect(getStatusCode(new FakeHttpError(409, {}))).toBe(409);
  });

  it('should ignore values without one', () => {
    expect(getStatusCode(new Error('boom'))).toBeUndefined();
    expect(getStatusCode({ statusCode: '500' })).toBeUndefined();
    expect(getStatusCode(null)).toBeUndefined();
  });

  it('should detect 404', () => {
    expect(isNotFound(new FakeHttpError(404, {}))).toBe(true);
    expect(isNotFound(new FakeHttpError(403, {}))).toBe(false);
  });
});

describe('describeClusterError', () => {
  it('should prefer the Status message from the response body', () => {
    const error = new FakeHttpError(422, { kind: 'Status', message: 'spec.replicas: Invalid value' });
    expect(describeClusterError(error)).toBe('spec.replicas: Invalid value');
  });

  it('should fall back to the error message', () => {
    expect(describeClusterError(new FakeHttpError(500, 'oops'))).toBe('HTTP request failed');
  });

  it('should stringify non-errors', () => {
    expect(describeClusterError('socket hang up')).toBe('socket hang up');
  });
});

describe('isTransientClusterError', () => {
  it.each([408, 429, 500, 502, 503, 504])('should treat %i as transient', (code) => {
    expect(isTransientClusterError(new FakeHttpError(code, {}))).toBe(true);
  });

  it.each([400, 403, 404, 409, 422])('should treat %i as a rejection', (code) => {
    expect(isTransientClusterError(new FakeHttpError(code, {}))).toBe(false);
  });

  it('should treat errors without a response as transient', () => {
    expect(isTransientClusterError(new Error('connect ECONNREFUSED 127.0.0.1:6443'))).toBe(true);
  });

  it('should reject kinds the cluster does not serve', () => {
    const error = new Error('Unrecognized API version and kind: example.com/v1 Widget');
    expect(isTransientClusterError(error)).toBe(false);
  });
});

describe('classifyClusterError', () => {
  it('should map transient failures to TransportError', () => {
    const classified = classifyClusterError(new FakeHttpError(503, { message: 'etcd unavailable' }), deployment);

    expect(classified).toBeInstanceOf(TransportError);
    expect(classified.message).toBe('etcd unavailable');
    expect(classified instanceof TransportError && classified.statusCode).toBe(503);
  });

  it('should map rejections to ApplyError with one failure entry', () => {
    const classified = classifyClusterError(new FakeHttpError(422, { message: 'invalid' }), deployment);

    expect(classified).toBeInstanceOf(ApplyError);
    expect(classified instanceof ApplyError && classified.failures).toEqual([
      { kind: 'Deployment', name: 'backend', namespace: 'production', statusCode: 422, message: 'invalid' },
    ]);
  });

  it('should pass taxonomy errors through untouched', () => {
    const original = new TransportError('already classified');
    expect(classifyClusterError(original)).toBe(original);
  });
});
