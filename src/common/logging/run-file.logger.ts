import { ConsoleLogger, LogLevel } from '@nestjs/common';
import { appendFileSync, mkdirSync } from 'fs';
import { dirname } from 'path';
import dayjs from 'dayjs';

export interface RunFileLoggerOptions {
  /** false면 파일 기록 없이 콘솔만 사용 */
  enableFile: boolean;
  filePath: string;
  verbose: boolean;
}

const BASE_LEVELS: LogLevel[] = ['log', 'warn', 'error', 'fatal'];

/**
 * 콘솔 + 실행 로그 파일 동시 기록 로거
 * 파일에는 `[YYYY-MM-DD HH:mm:ss] message` 형식으로 한 줄씩 append 한다.
 */
export class RunFileLogger extends ConsoleLogger {
  constructor(private readonly fileOptions: RunFileLoggerOptions) {
    super('SteamQueue', {
      logLevels: fileOptions.verbose ? [...BASE_LEVELS, 'debug'] : BASE_LEVELS,
    });
  }

  /**
   * 로그 디렉터리 생성 + 세션 헤더 기록
   */
  openSession(now: Date = new Date()): void {
    if (!this.fileOptions.enableFile) return;
    const dir = dirname(this.fileOptions.filePath);
    if (dir && dir !== '.') {
      mkdirSync(dir, { recursive: true });
    }
    const rule = '='.repeat(50);
    appendFileSync(
      this.fileOptions.filePath,
      `\n${rule}\nScript started at ${dayjs(now).format('YYYY-MM-DD HH:mm:ss')}\n${rule}\n`,
      'utf-8',
    );
  }

  protected printMessages(
    messages: unknown[],
    context = '',
    logLevel: LogLevel = 'log',
    writeStreamType?: 'stdout' | 'stderr',
  ): void {
    super.printMessages(messages, context, logLevel, writeStreamType);
    if (!this.fileOptions.enableFile) return;

    const stamp = dayjs().format('YYYY-MM-DD HH:mm:ss');
    const lines = messages
      .map((message) => formatFileLine(stamp, logLevel, message))
      .join('');
    appendFileSync(this.fileOptions.filePath, lines, 'utf-8');
  }
}

export function formatFileLine(
  stamp: string,
  logLevel: LogLevel,
  message: unknown,
): string {
  const text =
    typeof message === 'string' ? message : JSON.stringify(message) ?? '';
  const level = logLevel === 'log' ? '' : `${logLevel.toUpperCase()} `;
  return `[${stamp}] ${level}${text.replace(/\r/g, '')}\n`;
}
