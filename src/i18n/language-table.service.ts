import { Logger } from '@nestjs/common';
import { promises as fs } from 'fs';
import { describeError, errnoCode } from '../common/errors/pipeline.errors';
import {
  DEFAULT_LANGUAGE,
  DEFAULT_STRINGS,
  isMessageKey,
  MessageKey,
} from './default-strings';

type LanguageTables = Map<string, Partial<Record<MessageKey, string>>>;

/**
 * 다국어 문자열 테이블
 * 파일 포맷: `lang|key|value` (한 줄에 하나, `#` 주석/빈 줄 무시)
 * 선택 언어 → 파일의 english → 내장 영어 순으로 대체한다.
 */
export class LanguageTableService {
  private static readonly logger = new Logger(LanguageTableService.name);

  constructor(
    private readonly strings: Partial<Record<MessageKey, string>> = {},
  ) {}

  static async load(
    filePath: string,
    language: string,
  ): Promise<LanguageTableService> {
    let content: string;
    try {
      content = await fs.readFile(filePath, 'utf-8');
    } catch (error) {
      const reason = errnoCode(error) === 'ENOENT' ? '파일 없음' : describeError(error);
      this.logger.warn(`⚠️ 언어 파일 로드 실패 (${filePath}): ${reason} → 기본 영어 사용`);
      return new LanguageTableService();
    }

    const tables = LanguageTableService.parse(content);
    const selected = tables.get(language) ?? tables.get(DEFAULT_LANGUAGE) ?? {};
    if (!tables.has(language)) {
      this.logger.debug(`언어 "${language}" 없음 → ${DEFAULT_LANGUAGE} 사용`);
    }
    return new LanguageTableService(selected);
  }

  static parse(content: string): LanguageTables {
    const tables: LanguageTables = new Map();
    for (const rawLine of content.split(/\r?\n/)) {
      const line = rawLine.trim();
      if (!line || line.startsWith('#')) continue;

      const first = line.indexOf('|');
      const second = first < 0 ? -1 : line.indexOf('|', first + 1);
      if (second < 0) continue;

      const lang = line.slice(0, first).trim();
      const key = line.slice(first + 1, second).trim();
      const value = line.slice(second + 1);
      if (!lang || !isMessageKey(key)) continue;

      const table = tables.get(lang) ?? {};
      table[key] = value;
      tables.set(lang, table);
    }
    return tables;
  }

  get(key: MessageKey): string {
    return this.strings[key] ?? DEFAULT_STRINGS[key];
  }

  /**
   * `{}` 자리표시자를 순서대로 치환
   */
  format(key: MessageKey, ...args: Array<string | number>): string {
    let index = 0;
    return this.get(key).replace(/\{\}/g, (placeholder) =>
      index < args.length ? String(args[index++]) : placeholder,
    );
  }
}
