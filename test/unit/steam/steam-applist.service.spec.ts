import { promises as fs } from 'fs';
import { join } from 'path';
import { IntervalRateLimiter } from '../../../src/common/concurrency/interval-rate-limiter';
import {
  PipelineError,
  PipelineErrorCode,
} from '../../../src/common/errors/pipeline.errors';
import { SoftwareCatalogFileService } from '../../../src/pipeline/persistence/services/software-catalog-file.service';
import { SteamAppListService } from '../../../src/steam/services/steam-applist.service';
import { FakeClock } from '../../support/fake-clock';
import {
  createHttpServiceStub,
  httpStatusError,
  queryParam,
  StubResponder,
} from '../../support/http-stub';
import {
  buildSettings,
  createConfigService,
  createWorkDir,
  removeWorkDir,
} from '../../support/settings.fixture';

const page = (
  apps: Array<[number, string]>,
  more?: { last_appid: number },
) => ({
  response: {
    apps: apps.map(([appid, name]) => ({ appid, name, last_modified: 1 })),
    ...(more ? { have_more_results: true, last_appid: more.last_appid } : {}),
  },
});

describe('SteamAppListService', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await createWorkDir();
  });

  afterEach(async () => {
    await removeWorkDir(dir);
  });

  const createService = (responder: StubResponder) => {
    const { httpService, requests } = createHttpServiceStub(responder);
    const configService = createConfigService(
      buildSettings(dir, { api: { rate_limit: 1.5 } }),
    );
    const clock = new FakeClock();
    const service = new SteamAppListService(
      httpService,
      configService,
      new SoftwareCatalogFileService(configService),
      new IntervalRateLimiter(1500, clock),
    );
    return { service, requests, clock };
  };

  it('소프트웨어/DLC만 포함하도록 요청한다', async () => {
    const { service, requests } = createService(() => page([[10, 'Tool']]));

    await service.fetchSoftwareAndDlc();

    expect(requests).toHaveLength(1);
    expect(requests[0].url).toBe(
      'https://api.steampowered.com/IStoreService/GetAppList/v1/',
    );
    expect(requests[0].params).toEqual({
      key: 'test-secret',
      include_games: false,
      include_dlc: true,
      include_software: true,
      include_videos: false,
      include_hardware: false,
      max_results: 50000,
    });
  });

  it('have_more_results 동안 last_appid로 다음 페이지를 요청한다', async () => {
    const { service, requests, clock } = createService((config) =>
      queryParam(config, 'last_appid') === undefined
        ? page([[10, 'Tool'], [20, 'DLC Pack']], { last_appid: 20 })
        : page([[30, 'Editor']]),
    );

    const apps = await service.fetchSoftwareAndDlc();

    expect(apps).toEqual([
      { appid: '10', name: 'Tool' },
      { appid: '20', name: 'DLC Pack' },
      { appid: '30', name: 'Editor' },
    ]);
    expect(requests.map((request) => queryParam(request, 'last_appid'))).toEqual([
      undefined,
      '20',
    ]);
    // 페이지마다 Rate Limiter를 거친다
    expect(clock.sleeps).toEqual([1500]);
  });

  it('숫자가 아닌 appid 항목은 건너뛴다', async () => {
    const { service } = createService(() => ({
      response: {
        apps: [{ name: 'No Id' }, { appid: 10, name: 'Tool' }],
      },
    }));

    await expect(service.fetchSoftwareAndDlc()).resolves.toEqual([
      { appid: '10', name: 'Tool' },
    ]);
  });

  it('last_appid 가 진행되지 않으면 페이지 수집을 멈춘다', async () => {
    const { service, requests } = createService((config) =>
      queryParam(config, 'last_appid') === undefined
        ? page([[10, 'Tool'], [20, 'DLC Pack']], { last_appid: 20 })
        : page([], { last_appid: 20 }),
    );

    const apps = await service.fetchSoftwareAndDlc();

    expect(apps.map((app) => app.appid)).toEqual(['10', '20']);
    expect(requests).toHaveLength(2);
  });

  it('카탈로그를 두 번 동기화해도 줄이 중복되지 않는다', async () => {
    const { service } = createService(() => page([[10, 'Tool'], [20, 'DLC Pack']]));

    const first = await service.syncSoftwareCatalog();
    const second = await service.syncSoftwareCatalog();

    expect([...first]).toEqual(['10', '20']);
    expect([...second]).toEqual(['10', '20']);
    expect(await fs.readFile(join(dir, 'software.txt'), 'utf-8')).toBe(
      '10 #Tool\n20 #DLC Pack\n',
    );
  });

  it('기존 카탈로그 + 신규 항목의 합집합을 반환한다', async () => {
    await fs.writeFile(join(dir, 'software.txt'), '5 #Old Tool\n', 'utf-8');
    const { service } = createService(() => page([[10, 'Tool']]));

    const catalog = await service.syncSoftwareCatalog();

    expect([...catalog]).toEqual(['5', '10']);
    expect(await fs.readFile(join(dir, 'software.txt'), 'utf-8')).toBe(
      '5 #Old Tool\n10 #Tool\n',
    );
  });

  it('HTTP 오류는 CATALOG_FETCH_FAILED', async () => {
    const { service } = createService((config) => {
      throw httpStatusError(config, 503);
    });

    const error = await service.fetchSoftwareAndDlc().catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(PipelineError);
    expect(error).toMatchObject({
      code: PipelineErrorCode.CATALOG_FETCH_FAILED,
      message:
        'Failed to fetch software list: HTTP 503 GET https://api.steampowered.com/IStoreService/GetAppList/v1/',
    });
  });

  it('response 객체가 없는 응답은 실패로 본다', async () => {
    const { service } = createService(() => ({}));

    await expect(service.fetchSoftwareAndDlc()).rejects.toMatchObject({
      code: PipelineErrorCode.CATALOG_FETCH_FAILED,
    });
  });
});
