import { promises as fs } from 'fs';
import { dirname } from 'path';
import {
  describeError,
  errnoCode,
  PipelineError,
  PipelineErrorCode,
} from '../../../common/errors/pipeline.errors';

/**
 * 파일 전체 읽기 (없으면 null)
 */
export async function readOptionalFile(path: string): Promise<string | null> {
  try {
    return await fs.readFile(path, 'utf-8');
  } catch (error) {
    if (errnoCode(error) === 'ENOENT') return null;
    throw new PipelineError(
      PipelineErrorCode.FILE_READ_FAILED,
      `Cannot read ${path}: ${describeError(error)}`,
      error,
    );
  }
}

/**
 * 버퍼 단위 쓰기 (append=false면 덮어쓰기)
 */
export async function writeWholeFile(
  path: string,
  content: string,
  append = false,
): Promise<void> {
  try {
    const dir = dirname(path);
    if (dir && dir !== '.') {
      await fs.mkdir(dir, { recursive: true });
    }
    if (append) {
      await fs.appendFile(path, content, 'utf-8');
    } else {
      await fs.writeFile(path, content, 'utf-8');
    }
  } catch (error) {
    throw new PipelineError(
      PipelineErrorCode.FILE_WRITE_FAILED,
      `Cannot write ${path}: ${describeError(error)}`,
      error,
    );
  }
}
