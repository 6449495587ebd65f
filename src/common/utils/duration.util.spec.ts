import { formatHms, UNKNOWN_DURATION } from './duration.util';

describe('duration.util', () => {
  describe('formatHms', () => {
    it('초를 HH:MM:SS로 표시한다', () => {
      expect(formatHms(0)).toBe('00:00:00');
      expect(formatHms(15)).toBe('00:00:15');
      expect(formatHms(3661)).toBe('01:01:01');
    });

    it('소수점 이하는 버린다', () => {
      expect(formatHms(4.5)).toBe('00:00:04');
      expect(formatHms(59.999)).toBe('00:00:59');
    });

    it('24시간을 넘어도 시간 자리를 그대로 늘린다', () => {
      expect(formatHms(90_000)).toBe('25:00:00');
    });

    it('음수/NaN/Infinity 는 00:00:00', () => {
      expect(formatHms(-5)).toBe('00:00:00');
      expect(formatHms(Number.NaN)).toBe('00:00:00');
      expect(formatHms(Number.POSITIVE_INFINITY)).toBe('00:00:00');
    });
  });

  it('남은 시간을 모를 때 표시', () => {
    expect(UNKNOWN_DURATION).toBe('--:--:--');
  });
});
