import {
  FailureReason,
  NoMatchFoundError,
  UpstreamUnavailableError,
  ValidationFailedError,
  errorMessage
} from '../errors';

describe('errors', () => {
  it('carries measured values on validation failures', () => {
    const error = new ValidationFailedError(1000, 0);

    expect(error.code).toBe(FailureReason.VALIDATION_FAILED);
    expect(error.message).toBe('File validation failed (size: 1000, bitrate: 0)');
    expect(error.name).toBe('ValidationFailedError');
  });

  it('keeps the upstream failure kind and retry hint', () => {
    const error = new UpstreamUnavailableError('rate-limit', 'slow down', 2000);

    expect(error).toBeInstanceOf(Error);
    expect(error.kind).toBe('rate-limit');
    expect(error.retryAfterMs).toBe(2000);
  });

  it('normalizes thrown values to messages', () => {
    expect(errorMessage(new NoMatchFoundError('Northern Lights'))).toBe('No match found for: Northern Lights');
    expect(errorMessage('plain')).toBe('plain');
    expect(errorMessage(42)).toBe('42');
  });
});
