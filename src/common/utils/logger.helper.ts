import { Logger } from '@nestjs/common';

function formatContext(context: unknown): string {
  if (context === undefined) return '';
  return typeof context === 'object' ? JSON.stringify(context) : String(context);
}

export class LoggerHelper {
  static logStart(logger: Logger, operation: string, context?: unknown): void {
    const contextStr = context !== undefined ? ` (${formatContext(context)})` : '';
    logger.debug(`${operation} 시작${contextStr}`);
  }

  static logComplete(
    logger: Logger,
    operation: string,
    stats?: Record<string, unknown>,
  ): void {
    const statsStr = stats
      ? ` - ${Object.entries(stats)
          .map(([key, value]) => `${key}: ${String(value)}`)
          .join(', ')}`
      : '';
    logger.debug(`${operation} 완료${statsStr}`);
  }
}
