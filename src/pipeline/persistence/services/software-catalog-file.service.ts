import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { FilesSettings } from '../../../config/settings.schema';
import { AppId, SteamApp } from '../../../types/steam.types';
import { collectLeadingIds, formatCatalogLine } from '../line-format.util';
import { readOptionalFile, writeWholeFile } from './file-io.util';

/**
 * 소프트웨어/DLC 카탈로그 파일 (`{id} #{name}`, append-only)
 * 기존 줄은 절대 재작성/재정렬하지 않는다.
 */
@Injectable()
export class SoftwareCatalogFileService {
  private readonly logger = new Logger(SoftwareCatalogFileService.name);
  private readonly path: string;

  constructor(configService: ConfigService) {
    this.path = configService.getOrThrow<FilesSettings>('files').software_file;
  }

  async readKnownIds(): Promise<Set<AppId>> {
    const content = await readOptionalFile(this.path);
    return content === null ? new Set() : collectLeadingIds(content);
  }

  /**
   * 아직 없는 AppID만 한 번에 append
   * @returns 이번에 추가된 앱 목록
   */
  async appendNew(apps: SteamApp[], known: Set<AppId>): Promise<SteamApp[]> {
    const added: SteamApp[] = [];
    const seen = new Set(known);
    for (const app of apps) {
      if (seen.has(app.appid)) continue;
      seen.add(app.appid);
      added.push(app);
    }
    if (added.length === 0) return added;

    const existing = await readOptionalFile(this.path);
    const separator = existing && !existing.endsWith('\n') ? '\n' : '';
    const body = added.map((app) => `${formatCatalogLine(app)}\n`).join('');
    await writeWholeFile(this.path, separator + body, true);

    this.logger.debug(`📥 카탈로그 ${added.length}개 추가 → ${this.path}`);
    return added;
  }
}
