import { getLimiter, getLimiterStats, scheduleWithLimit } from '../../../src/util/limiter.js';

describe('Limiter', () => {
  it('should get limiter for host', () => {
    const limiter = getLimiter('example.com');
    expect(typeof limiter.schedule).toBe('function');
  });

  it('should reuse limiter for same host', () => {
    expect(getLimiter('test.com')).toBe(getLimiter('test.com'));
  });

  it('should execute function with rate limiting', async () => {
    const testFn = jest.fn().mockResolvedValue('result');
    const result = await scheduleWithLimit('test-host.com', testFn);
    expect(result).toBe('result');
    expect(testFn).toHaveBeenCalledTimes(1);
  });

  it('should propagate rejections', async () => {
    await expect(scheduleWithLimit('reject.example.com', () => Promise.reject(new Error('boom')))).rejects.toThrow('boom');
  });

  it('should report idle stats for a known host', () => {
    getLimiter('stats-test.com');
    expect(getLimiterStats('stats-test.com')).toEqual({ queued: 0, running: 0 });
  });

  it('should return null for non-existent limiter stats', () => {
    expect(getLimiterStats('non-existent.com')).toBeNull();
  });
});
