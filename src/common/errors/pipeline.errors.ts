import { isAxiosError } from 'axios';

export enum PipelineErrorCode {
  INPUT_FILE_NOT_FOUND = 'INPUT_FILE_NOT_FOUND',
  FILE_READ_FAILED = 'FILE_READ_FAILED',
  FILE_WRITE_FAILED = 'FILE_WRITE_FAILED',
  CATALOG_FETCH_FAILED = 'CATALOG_FETCH_FAILED',
  LIBRARY_FETCH_FAILED = 'LIBRARY_FETCH_FAILED',
}

/**
 * 실행 단위 실패 (파이프라인 최상단에서 잡아 한 줄 메시지로 보고)
 */
export class PipelineError extends Error {
  constructor(
    readonly code: PipelineErrorCode,
    message: string,
    cause?: unknown,
  ) {
    super(message, { cause });
    this.name = 'PipelineError';
  }
}

/**
 * 설정 파일 누락/파싱/검증 실패 (파이프라인 구성 전 종료)
 */
export class SettingsError extends Error {
  constructor(
    message: string,
    readonly details: string[] = [],
  ) {
    super(message);
    this.name = 'SettingsError';
  }
}

/**
 * 운영자에게 보여줄 한 줄짜리 에러 설명 (스택 트레이스 제외)
 */
export function describeError(error: unknown): string {
  if (isAxiosError(error)) {
    const method = error.config?.method?.toUpperCase() ?? 'GET';
    const url = error.config?.url ?? '(unknown)';
    if (error.response) {
      return `HTTP ${error.response.status} ${method} ${url}`;
    }
    return `${error.code ?? 'NETWORK_ERROR'} ${method} ${url}: ${error.message}`;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * 부트스트랩 단계의 예상 못 한 실패 (한 줄)
 */
export function formatFatalError(error: unknown): string {
  return `Fatal error: ${describeError(error)}`;
}

/**
 * fs 에러의 errno 코드 (ENOENT 등) 추출
 */
export function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}
