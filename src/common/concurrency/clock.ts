import { setTimeout as sleep } from 'timers/promises';

/**
 * 시간 소스 추상화
 * Rate Limiter / 진행률 계산이 테스트에서 가짜 시계를 쓸 수 있도록 분리
 */
export interface Clock {
  /** epoch 기준 밀리초 */
  now(): number;
  sleep(ms: number): Promise<void>;
}

export const CLOCK = Symbol('CLOCK');

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: async (ms: number) => {
    await sleep(ms);
  },
};
