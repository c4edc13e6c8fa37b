import { QueryFailedError } from 'typeorm';
import { isUniqueViolation, withOptimisticRetry } from './optimistic-retry.helper';
import { ConcurrentModificationError, DeadlinePassedError } from '../errors/betting.errors';

describe('withOptimisticRetry', () => {
  const conflict = () => new ConcurrentModificationError('lost the race');

  it('should return the first successful attempt', async () => {
    const attempt = jest.fn().mockResolvedValue('done');

    await expect(withOptimisticRetry({ operation: 'test', maxRetries: 3 }, attempt)).resolves.toBe('done');
    expect(attempt).toHaveBeenCalledWith(1);
  });

  it('should retry version conflicts with a fresh attempt number', async () => {
    const onConflict = jest.fn();
    const attempt = jest
      .fn()
      .mockRejectedValueOnce(conflict())
      .mockRejectedValueOnce(conflict())
      .mockResolvedValue('done');

    const result = await withOptimisticRetry({ operation: 'test', maxRetries: 3, onConflict }, attempt);

    expect(result).toBe('done');
    expect(attempt.mock.calls).toEqual([[1], [2], [3]]);
    expect(onConflict).toHaveBeenCalledTimes(2);
  });

  it('should give up after the configured retries', async () => {
    const attempt = jest.fn().mockRejectedValue(conflict());

    await expect(withOptimisticRetry({ operation: 'test', maxRetries: 2 }, attempt)).rejects.toThrow(
      ConcurrentModificationError,
    );
    expect(attempt).toHaveBeenCalledTimes(3);
  });

  it('should not retry other failures', async () => {
    const attempt = jest.fn().mockRejectedValue(new DeadlinePassedError('too late'));

    await expect(withOptimisticRetry({ operation: 'test', maxRetries: 3 }, attempt)).rejects.toThrow(
      DeadlinePassedError,
    );
    expect(attempt).toHaveBeenCalledTimes(1);
  });
});

describe('isUniqueViolation', () => {
  it('should recognize Postgres unique violations', () => {
    const error = new QueryFailedError('INSERT', [], Object.assign(new Error('duplicate'), { code: '23505' }));

    expect(isUniqueViolation(error)).toBe(true);
  });

  it('should ignore other errors', () => {
    expect(
      isUniqueViolation(new QueryFailedError('INSERT', [], Object.assign(new Error('null'), { code: '23502' }))),
    ).toBe(false);
    expect(isUniqueViolation(new Error('duplicate'))).toBe(false);
  });
});
