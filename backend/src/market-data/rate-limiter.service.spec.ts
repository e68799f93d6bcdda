import { ConfigService } from '@nestjs/config';
import { RateLimiterService } from './rate-limiter.service';

describe('RateLimiterService', () => {
  let limiter: RateLimiterService;

  beforeEach(() => {
    jest.useFakeTimers();
    limiter = new RateLimiterService(new ConfigService({ ALPHA_VANTAGE_REQUESTS_PER_MINUTE: '2' }));
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  it('holds the request over budget until the window slides', async () => {
    await limiter.acquire();
    await limiter.acquire();
    expect(limiter.getStatus()).toEqual({ requestsLastMinute: 2, remainingRequests: 0 });

    let released = false;
    const third = limiter.acquire().then(() => {
      released = true;
    });

    await jest.advanceTimersByTimeAsync(59_000);
    expect(released).toBe(false);

    await jest.advanceTimersByTimeAsync(1_000);
    await third;
    expect(released).toBe(true);
    expect(limiter.getStatus().requestsLastMinute).toBe(1);
  });

  it('stops waiting when aborted', async () => {
    await limiter.acquire();
    await limiter.acquire();

    const controller = new AbortController();
    const waiting = limiter.acquire(controller.signal);
    controller.abort();

    await expect(waiting).rejects.toMatchObject({ name: 'AbortError' });
    expect(limiter.getStatus().requestsLastMinute).toBe(2);
  });

  it('falls back to 5 requests per minute on a bad setting', async () => {
    const fallback = new RateLimiterService(new ConfigService({ ALPHA_VANTAGE_REQUESTS_PER_MINUTE: 'many' }));

    for (let i = 0; i < 5; i++) {
      await fallback.acquire();
    }
    expect(fallback.getStatus()).toEqual({ requestsLastMinute: 5, remainingRequests: 0 });
  });
});
