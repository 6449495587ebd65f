import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  PipelineError,
  PipelineErrorCode,
} from '../../../common/errors/pipeline.errors';
import { FilesSettings } from '../../../config/settings.schema';
import { AppId } from '../../../types/steam.types';
import { parseInputLine } from '../line-format.util';
import { readOptionalFile } from './file-io.util';

/**
 * 파일 모드 입력 목록 (한 줄에 AppID 하나, `#` 뒤 주석)
 */
@Injectable()
export class InputListService {
  private readonly path: string;

  constructor(configService: ConfigService) {
    this.path = configService.getOrThrow<FilesSettings>('files').input_file;
  }

  async readAppIds(): Promise<AppId[]> {
    const content = await readOptionalFile(this.path);
    if (content === null) {
      throw new PipelineError(
        PipelineErrorCode.INPUT_FILE_NOT_FOUND,
        `${this.path} not found!`,
      );
    }
    return content
      .split(/\r?\n/)
      .map(parseInputLine)
      .filter((appId) => appId.length > 0);
  }
}
