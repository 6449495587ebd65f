import {
  describeError,
  formatFatalError,
  PipelineError,
  PipelineErrorCode,
} from './pipeline.errors';

describe('pipeline.errors', () => {
  describe('formatFatalError', () => {
    it('스택 없이 메시지 한 줄만 남긴다', () => {
      const error = new Error('EACCES: permission denied, mkdir \'/locked/logs\'');

      const line = formatFatalError(error);

      expect(line).toBe("Fatal error: EACCES: permission denied, mkdir '/locked/logs'");
      expect(line.split('\n')).toHaveLength(1);
    });

    it('Error 가 아닌 값도 문자열로 보고한다', () => {
      expect(formatFatalError('context closed')).toBe('Fatal error: context closed');
    });
  });

  describe('describeError', () => {
    it('PipelineError 는 메시지만 쓴다', () => {
      const error = new PipelineError(
        PipelineErrorCode.FILE_READ_FAILED,
        'Cannot read games.txt: EISDIR',
      );

      expect(describeError(error)).toBe('Cannot read games.txt: EISDIR');
    });
  });
});
