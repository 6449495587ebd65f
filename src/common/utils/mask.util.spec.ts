import { maskSensitive } from './mask.util';

describe('maskSensitive', () => {
  it('중첩 객체의 민감 키를 가린다', () => {
    expect(
      maskSensitive({
        steam: { steam_id: 'test-user', api_key: 'test-secret' },
        api: { rate_limit: 1.5 },
      }),
    ).toEqual({
      steam: { steam_id: 'test-user', api_key: '[masked]' },
      api: { rate_limit: 1.5 },
    });
  });

  it('빈 문자열은 비어 있음을 알 수 있도록 그대로 둔다', () => {
    expect(maskSensitive({ api_key: '' })).toEqual({ api_key: '' });
  });

  it('키 비교는 대소문자를 무시한다', () => {
    expect(maskSensitive({ Token: 'abc', PASSWORD: 1 })).toEqual({
      Token: '[masked]',
      PASSWORD: '[masked]',
    });
  });

  it('배열과 원시값을 처리한다', () => {
    expect(maskSensitive([{ secret: 'x' }, 'plain'])).toEqual([
      { secret: '[masked]' },
      'plain',
    ]);
    expect(maskSensitive(null)).toBeNull();
    expect(maskSensitive(7)).toBe(7);
  });
});
