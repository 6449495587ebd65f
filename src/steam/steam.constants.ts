export const STEAM_STORE_API_URL = 'https://store.steampowered.com/api';
export const STEAM_WEB_API_URL = 'https://api.steampowered.com';
export const STEAM_COMMUNITY_URL = 'https://steamcommunity.com';

/** IStoreService/GetAppList 페이지당 최대 결과 수 */
export const APP_LIST_PAGE_SIZE = 50_000;

export const DEFAULT_DENUVO_STRINGS = [
  'Denuvo Anti-tamper',
  'Denuvo Antitamper',
] as const;

export const DENUVO_MARKER = '[DENUVO]';
export const UNKNOWN_PLATFORMS = 'Unknown';
export const QUEUE_VISIBILITY = 'Public';

export type PlatformKey = 'windows' | 'mac' | 'linux';
export type QueuePlatformCode = 'win64' | 'macos' | 'lin64';

/** 표시 순서 = Win/Mac/Lin */
export const PLATFORM_TABLE: ReadonlyArray<{
  key: PlatformKey;
  label: string;
  queueCode: QueuePlatformCode;
}> = [
  { key: 'windows', label: 'Win', queueCode: 'win64' },
  { key: 'mac', label: 'Mac', queueCode: 'macos' },
  { key: 'linux', label: 'Lin', queueCode: 'lin64' },
];

/** 프로세스 전역 Rate Limiter 주입 토큰 */
export const STEAM_RATE_LIMITER = Symbol('STEAM_RATE_LIMITER');

export const REQUEST_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0 Safari/537.36';
