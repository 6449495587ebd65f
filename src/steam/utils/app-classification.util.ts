import {
  AppClassification,
  AppId,
  SteamAppDetailsData,
} from '../../types/steam.types';
import {
  DENUVO_MARKER,
  PLATFORM_TABLE,
  PlatformKey,
  QueuePlatformCode,
  UNKNOWN_PLATFORMS,
} from '../steam.constants';

export interface ClassificationPolicy {
  /** 설정에서 활성화된 플랫폼 */
  platforms: Record<PlatformKey, boolean>;
  /** true면 Denuvo 게임은 큐에서 제외 */
  filterDenuvo: boolean;
  denuvoStrings: readonly string[];
}

/**
 * drm_notice 안에 패턴이 하나라도 (대소문자 무시) 포함되면 true
 */
export function detectDenuvo(
  drmNotice: string | undefined,
  patterns: readonly string[],
): boolean {
  if (!drmNotice) return false;
  const notice = drmNotice.toLowerCase();
  return patterns.some(
    (pattern) => pattern.length > 0 && notice.includes(pattern.toLowerCase()),
  );
}

export function unknownClassification(appId: AppId): AppClassification {
  return {
    appId,
    name: appId,
    platformSummary: UNKNOWN_PLATFORMS,
    queuePlatforms: [],
    hasDenuvo: false,
    isFree: false,
  };
}

/**
 * 상세 데이터 → 표시 문자열 / 큐 대상 플랫폼 도출
 *
 * 1. 원격 지원 && 설정 활성 → 표시 목록
 * 2. 표시된 플랫폼 중 유료 && (Denuvo 없음 || 필터 꺼짐) → 큐 코드
 * 3. Denuvo 감지 시 플랫폼 목록과 무관하게 " [DENUVO]" 접미사
 */
export function classifyAppDetails(
  appId: AppId,
  data: SteamAppDetailsData,
  policy: ClassificationPolicy,
): AppClassification {
  const isFree = data.is_free === true;
  const hasDenuvo = detectDenuvo(data.drm_notice, policy.denuvoStrings);
  const queueAllowed = !isFree && (!hasDenuvo || !policy.filterDenuvo);

  const labels: string[] = [];
  const queuePlatforms: QueuePlatformCode[] = [];
  for (const platform of PLATFORM_TABLE) {
    const supported = data.platforms?.[platform.key] === true;
    if (!supported || !policy.platforms[platform.key]) continue;

    labels.push(platform.label);
    if (queueAllowed) {
      queuePlatforms.push(platform.queueCode);
    }
  }

  const base = labels.length > 0 ? labels.join('/') : UNKNOWN_PLATFORMS;
  const name = data.name?.trim() ? data.name.trim() : appId;

  return {
    appId,
    name,
    platformSummary: hasDenuvo ? `${base} ${DENUVO_MARKER}` : base,
    queuePlatforms,
    hasDenuvo,
    isFree,
  };
}
