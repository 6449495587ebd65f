import { promises as fs } from 'fs';
import { join } from 'path';
import { LanguageTableService } from '../../../src/i18n/language-table.service';
import { createWorkDir, removeWorkDir } from '../../support/settings.fixture';

const TABLE = [
  '# comment line',
  'english|no_games|Nothing new here',
  'english|progress|Progress: {}% | Left: {} | Games: {}/{} | Denuvo: {}',
  '',
  'korean|no_games|처리할 새 게임이 없습니다',
  'korean|error|오류: {}',
  'korean|unknown_key|ignored',
  'pirate|error|Arr | {} | matey',
  'broken line without pipes',
].join('\n');

describe('LanguageTableService', () => {
  describe('parse', () => {
    it('언어별 테이블을 만들고 주석/빈 줄/알 수 없는 키는 건너뛴다', () => {
      const tables = LanguageTableService.parse(TABLE);

      expect([...tables.keys()]).toEqual(['english', 'korean', 'pirate']);
      expect(tables.get('korean')).toEqual({
        no_games: '처리할 새 게임이 없습니다',
        error: '오류: {}',
      });
    });

    it('처음 두 개의 | 로만 나누므로 값에 | 가 들어갈 수 있다', () => {
      expect(LanguageTableService.parse(TABLE).get('pirate')).toEqual({
        error: 'Arr | {} | matey',
      });
    });
  });

  describe('get / format', () => {
    it('테이블에 없는 키는 내장 영어 문자열을 쓴다', () => {
      const strings = new LanguageTableService({ no_games: '없음' });

      expect(strings.get('no_games')).toBe('없음');
      expect(strings.get('cancelled')).toBe('Operation cancelled by user');
    });

    it('{} 자리표시자를 순서대로 치환한다', () => {
      const strings = new LanguageTableService();

      expect(strings.format('progress', '30.0', '00:00:07', 3, 10, 1)).toBe(
        'Progress: 30.0% | Time remaining: 00:00:07 | Games: 3/10 | Denuvo: 1',
      );
      expect(strings.format('added_games', 2, 'games.txt')).toBe(
        'Added 2 games to games.txt',
      );
    });

    it('인자가 모자라면 남은 자리표시자는 그대로 둔다', () => {
      expect(new LanguageTableService().format('added_games', 5)).toBe(
        'Added 5 games to {}',
      );
    });
  });

  describe('load', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await createWorkDir();
      await fs.writeFile(join(dir, 'language.txt'), TABLE, 'utf-8');
    });

    afterEach(async () => {
      await removeWorkDir(dir);
    });

    it('선택한 언어 테이블을 사용한다', async () => {
      const strings = await LanguageTableService.load(join(dir, 'language.txt'), 'korean');

      expect(strings.get('no_games')).toBe('처리할 새 게임이 없습니다');
      expect(strings.format('error', 'x')).toBe('오류: x');
      expect(strings.get('cancelled')).toBe('Operation cancelled by user');
    });

    it('없는 언어는 파일의 english 테이블로 대체한다', async () => {
      const strings = await LanguageTableService.load(join(dir, 'language.txt'), 'klingon');

      expect(strings.get('no_games')).toBe('Nothing new here');
    });

    it('파일이 없으면 내장 영어 문자열', async () => {
      const strings = await LanguageTableService.load(join(dir, 'missing.txt'), 'korean');

      expect(strings.get('no_games')).toBe('No new games to process');
    });
  });
});
