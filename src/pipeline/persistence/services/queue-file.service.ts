import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { FilesSettings } from '../../../config/settings.schema';
import { QueueEntry } from '../../types/pipeline.types';
import { formatQueueLine } from '../line-format.util';
import { writeWholeFile } from './file-io.util';

/**
 * 패키징 도구용 큐 파일 (`{platform}|{id}|Public|`)
 * 누적하지 않고 매 실행마다 전체를 다시 쓴다.
 */
@Injectable()
export class QueueFileService {
  private readonly path: string;

  constructor(configService: ConfigService) {
    this.path = configService.getOrThrow<FilesSettings>('files').queue_file;
  }

  async write(entries: QueueEntry[]): Promise<void> {
    await writeWholeFile(this.path, entries.map(formatQueueLine).join('\n'));
  }
}
