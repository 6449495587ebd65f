import { toPrintableAscii } from '../../common/utils/ascii.util';
import { AppClassification, AppId, SteamApp } from '../../types/steam.types';
import { QueueEntry } from '../types/pipeline.types';

/** 카탈로그 / 게임 로그에서 AppID와 이름을 나누는 구분자 */
export const NAME_DELIMITER = ' #';

/**
 * `"{id} #{name}..."` 한 줄에서 AppID 부분만 추출
 */
export function extractLeadingId(line: string): AppId {
  return line.split(NAME_DELIMITER)[0].trim();
}

/**
 * 파일 내용 → 비어 있지 않은 줄들의 AppID 집합
 */
export function collectLeadingIds(content: string): Set<AppId> {
  const ids = new Set<AppId>();
  for (const line of content.split(/\r?\n/)) {
    if (!line.trim()) continue;
    const id = extractLeadingId(line);
    if (id) ids.add(id);
  }
  return ids;
}

/** 입력 목록 한 줄: `#` 뒤는 주석 */
export function parseInputLine(line: string): AppId {
  return line.split('#')[0].trim();
}

export function formatCatalogLine(app: SteamApp): string {
  return `${app.appid}${NAME_DELIMITER}${toPrintableAscii(app.name)}`;
}

export function formatGamesLogLine(classification: AppClassification): string {
  return `${classification.appId}${NAME_DELIMITER}${toPrintableAscii(classification.name)} [${classification.platformSummary}]`;
}

export function formatQueueLine(entry: QueueEntry): string {
  return `${entry.platformCode}|${entry.appId}|${entry.visibility}|`;
}
