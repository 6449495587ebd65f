import { IntervalRateLimiter } from '../../../src/common/concurrency/interval-rate-limiter';
import { PipelineErrorCode } from '../../../src/common/errors/pipeline.errors';
import {
  buildLibraryUrl,
  SteamLibraryService,
} from '../../../src/steam/services/steam-library.service';
import { FakeClock } from '../../support/fake-clock';
import {
  createHttpServiceStub,
  httpStatusError,
  StubResponder,
} from '../../support/http-stub';
import { buildSettings, createConfigService } from '../../support/settings.fixture';

const createService = (responder: StubResponder, steamId = 'test-user') => {
  const { httpService, requests } = createHttpServiceStub(responder);
  const service = new SteamLibraryService(
    httpService,
    createConfigService(
      buildSettings('/tmp/unused', { steam: { steam_id: steamId } }),
    ),
    new IntervalRateLimiter(0, new FakeClock()),
  );
  return { service, requests };
};

describe('SteamLibraryService', () => {
  describe('buildLibraryUrl', () => {
    it('커스텀 URL은 /id/ 경로를 쓴다', () => {
      expect(buildLibraryUrl('test-user')).toBe(
        'https://steamcommunity.com/id/test-user/games?tab=all&xml=1',
      );
    });

    it('17자리 SteamID64는 /profiles/ 경로를 쓴다', () => {
      expect(buildLibraryUrl('76561190000000001')).toBe(
        'https://steamcommunity.com/profiles/76561190000000001/games?tab=all&xml=1',
      );
    });
  });

  it('XML 라이브러리를 텍스트로 받아 파싱한다', async () => {
    const { service, requests } = createService(
      () =>
        '<gamesList><games><game><appID>101</appID><name><![CDATA[Harbor Lights]]></name></game></games></gamesList>',
    );

    const library = await service.fetchOwnedGames();

    expect([...library.entries()]).toEqual([['101', 'Harbor Lights']]);
    expect(requests[0].url).toBe(
      'https://steamcommunity.com/id/test-user/games?tab=all&xml=1',
    );
    expect(requests[0].responseType).toBe('text');
  });

  it('비공개/없는 프로필 응답은 LIBRARY_FETCH_FAILED', async () => {
    const { service } = createService(
      () => '<response><error><![CDATA[The specified profile could not be found.]]></error></response>',
    );

    await expect(service.fetchOwnedGames()).rejects.toMatchObject({
      code: PipelineErrorCode.LIBRARY_FETCH_FAILED,
      message: 'Failed to fetch games list: The specified profile could not be found.',
    });
  });

  it('HTTP 오류는 LIBRARY_FETCH_FAILED', async () => {
    const { service } = createService((config) => {
      throw httpStatusError(config, 500);
    });

    await expect(service.fetchOwnedGames()).rejects.toMatchObject({
      code: PipelineErrorCode.LIBRARY_FETCH_FAILED,
      message:
        'Failed to fetch games list: HTTP 500 GET https://steamcommunity.com/id/test-user/games?tab=all&xml=1',
    });
  });
});
