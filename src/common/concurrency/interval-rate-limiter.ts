import { Logger } from '@nestjs/common';
import { Clock } from './clock';

/**
 * 최소 간격 기반 Rate Limiter
 *
 * - 모든 외부 호출(라이브러리/카탈로그/상세)이 하나의 타임스탬프를 공유
 * - 버스트 허용 없음, 엔드포인트별 버킷 없음
 * - 간격은 "호출 시작 ~ 다음 호출 시작" 기준 (대기 직후, 실제 요청 전에 기록)
 * - 첫 호출은 대기하지 않음
 */
export class IntervalRateLimiter {
  private readonly logger = new Logger(IntervalRateLimiter.name);
  private lastCallAt: number | null = null;
  private queue: Promise<void> = Promise.resolve();

  constructor(
    private readonly minSpacingMs: number,
    private readonly clock: Clock,
  ) {}

  get spacingMs(): number {
    return this.minSpacingMs;
  }

  /**
   * 다음 호출이 허용될 때까지 대기
   * 직렬화 큐를 거치므로 동시에 호출돼도 순서대로 간격이 적용된다.
   */
  async acquire(): Promise<void> {
    const turn = this.queue.then(() => this.consume());
    this.queue = turn;
    return turn;
  }

  private async consume(): Promise<void> {
    if (this.lastCallAt !== null && this.minSpacingMs > 0) {
      const elapsed = this.clock.now() - this.lastCallAt;
      const waitMs = this.minSpacingMs - elapsed;
      if (waitMs > 0) {
        this.logger.debug(`⏱️ Rate limit: ${(waitMs / 1000).toFixed(2)}초 대기`);
        await this.clock.sleep(waitMs);
      }
    }

    this.lastCallAt = this.clock.now();
  }
}
