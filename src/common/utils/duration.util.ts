/**
 * 초 단위 시간을 `HH:MM:SS`로 표시 (24시간을 넘으면 시간 자리가 늘어난다)
 */
export function formatHms(totalSeconds: number): string {
  const safe =
    Number.isFinite(totalSeconds) && totalSeconds > 0
      ? Math.floor(totalSeconds)
      : 0;
  const hours = Math.floor(safe / 3600);
  const minutes = Math.floor((safe % 3600) / 60);
  const seconds = safe % 60;
  return [hours, minutes, seconds]
    .map((part) => String(part).padStart(2, '0'))
    .join(':');
}

export const UNKNOWN_DURATION = '--:--:--';
