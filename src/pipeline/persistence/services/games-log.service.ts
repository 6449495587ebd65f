import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { FilesSettings } from '../../../config/settings.schema';
import { AppId } from '../../../types/steam.types';
import { collectLeadingIds } from '../line-format.util';
import { readOptionalFile, writeWholeFile } from './file-io.util';

export type GamesLogWriteMode = 'overwrite' | 'append';

/**
 * 처리된 게임 로그 (`{id} #{name} [{platforms}]`)
 * 여기 있는 AppID는 다음 실행에서 다시 조회하지 않는다.
 */
@Injectable()
export class GamesLogService {
  private readonly path: string;

  constructor(configService: ConfigService) {
    this.path = configService.getOrThrow<FilesSettings>('files').games_file;
  }

  get filePath(): string {
    return this.path;
  }

  async readProcessedIds(): Promise<Set<AppId>> {
    const content = await readOptionalFile(this.path);
    return content === null ? new Set() : collectLeadingIds(content);
  }

  /**
   * 파일 모드이거나 파일이 없으면 덮어쓰기, 아니면 (비어 있지 않을 때 개행 후) 이어쓰기
   */
  async save(lines: string[], queueFromFile: boolean): Promise<GamesLogWriteMode> {
    const existing = queueFromFile ? null : await readOptionalFile(this.path);
    const body = lines.join('\n');

    if (existing === null) {
      await writeWholeFile(this.path, body);
      return 'overwrite';
    }

    const separator = existing.length > 0 ? '\n' : '';
    await writeWholeFile(this.path, separator + body, true);
    return 'append';
  }
}
