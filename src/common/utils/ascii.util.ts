/**
 * 출력 가능한 ASCII(0x20-0x7E)만 남긴다.
 * 카탈로그/게임 로그 한 줄 포맷을 깨뜨리는 개행·제어문자도 함께 제거된다.
 */
export function toPrintableAscii(value: string): string {
  return value.replace(/[^\x20-\x7E]/g, '');
}
