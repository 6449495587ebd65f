import {
  formatHms,
  UNKNOWN_DURATION,
} from '../../common/utils/duration.util';

export interface ProgressSnapshot {
  /** 소수점 한 자리 퍼센트 */
  percent: string;
  remaining: string;
  processed: number;
  total: number;
  denuvoCount: number;
}

/**
 * 진행률 / 남은 시간 추정
 * 남은 시간 = (전체 - 처리) × 경과 / 처리, 처리 0건이면 표시하지 않는다.
 */
export class ProgressTracker {
  constructor(
    private readonly total: number,
    private readonly startedAt: number,
  ) {}

  snapshot(processed: number, denuvoCount: number, now: number): ProgressSnapshot {
    const percent = this.total > 0 ? (processed / this.total) * 100 : 0;
    let remaining = UNKNOWN_DURATION;
    if (processed > 0) {
      const elapsedSeconds = Math.max(0, now - this.startedAt) / 1000;
      remaining = formatHms(
        ((this.total - processed) * elapsedSeconds) / processed,
      );
    }

    return {
      percent: percent.toFixed(1),
      remaining,
      processed,
      total: this.total,
      denuvoCount,
    };
  }
}
