import { describe, it, expect } from 'vitest';
import {
  AuthExpiredError,
  GenerationFailedError,
  PostRejectedError,
  UpstreamUnavailableError,
  errorMessage,
  rejectionReasonForStatus,
} from '../../../src/lib/errors.js';

describe('error taxonomy', () => {
  it('should name errors after their class', () => {
    expect(new AuthExpiredError('expired').name).toBe('AuthExpiredError');
    expect(new UpstreamUnavailableError('down', 503).name).toBe('UpstreamUnavailableError');
  });

  it('should mark transient failures as retryable', () => {
    expect(new AuthExpiredError('expired')).toMatchObject({ kind: 'auth_expired', retryable: true });
    expect(new UpstreamUnavailableError('down', 503)).toMatchObject({
      kind: 'upstream_unavailable',
      retryable: true,
      statusCode: 503,
    });
    expect(new GenerationFailedError('empty_output', 'empty')).toMatchObject({
      kind: 'generation_failed',
      retryable: true,
    });
  });

  it('should derive terminality of a rejection from its reason', () => {
    expect(new PostRejectedError('review_not_found', 'gone', 404)).toMatchObject({
      terminal: true,
      retryable: false,
    });
    expect(new PostRejectedError('already_replied', 'dupe', 409).terminal).toBe(true);
    expect(new PostRejectedError('invalid_reply', 'bad', 400)).toMatchObject({
      terminal: false,
      retryable: true,
    });
    expect(new PostRejectedError('unknown', '?', 422).terminal).toBe(false);
  });

  it('should map HTTP statuses to rejection reasons', () => {
    expect(rejectionReasonForStatus(400)).toBe('invalid_reply');
    expect(rejectionReasonForStatus(403)).toBe('permission_denied');
    expect(rejectionReasonForStatus(404)).toBe('review_not_found');
    expect(rejectionReasonForStatus(409)).toBe('already_replied');
    expect(rejectionReasonForStatus(422)).toBe('unknown');
  });

  it('should keep the cause', () => {
    const cause = new Error('socket hang up');
    expect(new UpstreamUnavailableError('down', undefined, { cause }).cause).toBe(cause);
  });

  it('should describe non-Error values', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom');
    expect(errorMessage('plain')).toBe('plain');
  });
});
