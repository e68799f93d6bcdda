import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { abortableDelay } from '../common/utils/abortable-delay';

const DEFAULT_REQUESTS_PER_MINUTE = 5;

export interface RateLimitStatus {
  requestsLastMinute: number;
  remainingRequests: number;
}

/**
 * API Rate Limiter Service
 * Keeps the market data provider inside its per-minute request budget
 * (Alpha Vantage free tier: 5 requests per minute)
 */
@Injectable()
export class RateLimiterService {
  private readonly logger = new Logger(RateLimiterService.name);
  private readonly requests: number[] = [];
  private readonly maxRequestsPerMinute: number;
  private readonly MINUTE_MS = 60 * 1000;
  private readonly POLL_MS = 250;

  constructor(configService: ConfigService) {
    const configured = Number(configService.get('ALPHA_VANTAGE_REQUESTS_PER_MINUTE', DEFAULT_REQUESTS_PER_MINUTE));
    this.maxRequestsPerMinute = Number.isFinite(configured) && configured > 0 ? configured : DEFAULT_REQUESTS_PER_MINUTE;
  }

  /**
   * Resolves when a request may be made, and records it
   * Rejects with an AbortError when the signal fires while waiting
   */
  async acquire(signal?: AbortSignal): Promise<void> {
    this.cleanupOldRequests(Date.now());

    while (this.requests.length >= this.maxRequestsPerMinute) {
      const waitMs = Math.max(this.requests[0] + this.MINUTE_MS - Date.now(), this.POLL_MS);
      this.logger.debug(
        `Rate limit: ${this.requests.length}/${this.maxRequestsPerMinute} requests in last minute, waiting ${waitMs}ms`,
      );
      await abortableDelay(waitMs, signal);
      this.cleanupOldRequests(Date.now());
    }

    this.requests.push(Date.now());
  }

  private cleanupOldRequests(now: number): void {
    const cutoff = now - this.MINUTE_MS;
    while (this.requests.length > 0 && this.requests[0] <= cutoff) {
      this.requests.shift();
    }
  }

  getStatus(): RateLimitStatus {
    this.cleanupOldRequests(Date.now());
    return {
      requestsLastMinute: this.requests.length,
      remainingRequests: Math.max(this.maxRequestsPerMinute - this.requests.length, 0),
    };
  }
}
