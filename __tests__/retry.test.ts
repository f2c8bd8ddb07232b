import { EmbeddingUnavailableError, InputError } from '../utils/errors';
import { withRetry, withTimeout } from '../utils/retry';

const options = { maxAttempts: 3, baseDelayMs: 0, maxDelayMs: 0, label: 'test' };

describe('withRetry', () => {
  it('retries retryable failures until the operation succeeds', async () => {
    const operation = jest
      .fn<Promise<string>, []>()
      .mockRejectedValueOnce(new EmbeddingUnavailableError('busy'))
      .mockResolvedValueOnce('ok');

    await expect(withRetry(operation, options)).resolves.toBe('ok');
    expect(operation).toHaveBeenCalledTimes(2);
  });

  it('does not retry non-retryable failures', async () => {
    const operation = jest.fn<Promise<string>, []>().mockRejectedValue(new InputError('bad input'));

    await expect(withRetry(operation, options)).rejects.toThrow('bad input');
    expect(operation).toHaveBeenCalledTimes(1);
  });

  it('does not retry plain errors', async () => {
    const operation = jest.fn<Promise<string>, []>().mockRejectedValue(new Error('boom'));

    await expect(withRetry(operation, options)).rejects.toThrow('boom');
    expect(operation).toHaveBeenCalledTimes(1);
  });

  it('gives up after maxAttempts with the last error', async () => {
    const operation = jest.fn<Promise<string>, []>().mockRejectedValue(new EmbeddingUnavailableError('still busy'));

    await expect(withRetry(operation, options)).rejects.toThrow(EmbeddingUnavailableError);
    expect(operation).toHaveBeenCalledTimes(3);
  });
});

describe('withTimeout', () => {
  it('resolves with the value when the promise settles in time', async () => {
    await expect(withTimeout(Promise.resolve(7), 1000, () => new Error('late'))).resolves.toBe(7);
  });

  it('rejects with the timeout error when the promise is too slow', async () => {
    const never = new Promise<number>(() => undefined);

    await expect(withTimeout(never, 5, () => new Error('late'))).rejects.toThrow('late');
  });
});
