import { Inject, Injectable, Logger } from '@nestjs/common';
import { HttpService } from '@nestjs/axios';
import { ConfigService } from '@nestjs/config';
import { firstValueFrom } from 'rxjs';
import { IntervalRateLimiter } from '../../common/concurrency/interval-rate-limiter';
import {
  describeError,
  PipelineError,
  PipelineErrorCode,
} from '../../common/errors/pipeline.errors';
import { SteamSettings } from '../../config/settings.schema';
import { SoftwareCatalogFileService } from '../../pipeline/persistence/services/software-catalog-file.service';
import { AppId, SteamApp, StoreAppListResponse } from '../../types/steam.types';
import {
  APP_LIST_PAGE_SIZE,
  STEAM_RATE_LIMITER,
  STEAM_WEB_API_URL,
} from '../steam.constants';

const NUMERIC_APP_ID = /^\d+$/;

/**
 * Steam 소프트웨어/DLC 카탈로그 서비스
 *
 * 역할: IStoreService/GetAppList 에서 게임이 아닌 앱(소프트웨어, DLC)을 받아
 *       카탈로그 파일에 누적하고, 라이브러리에서 제외할 AppID 집합을 만든다.
 */
@Injectable()
export class SteamAppListService {
  private readonly logger = new Logger(SteamAppListService.name);

  constructor(
    private readonly httpService: HttpService,
    private readonly configService: ConfigService,
    private readonly catalogFile: SoftwareCatalogFileService,
    @Inject(STEAM_RATE_LIMITER)
    private readonly rateLimiter: IntervalRateLimiter,
  ) {}

  /**
   * 소프트웨어 + DLC 전체 목록 (페이지 단위 수집)
   * API: https://api.steampowered.com/IStoreService/GetAppList/v1/
   */
  async fetchSoftwareAndDlc(): Promise<SteamApp[]> {
    const { api_key } = this.configService.getOrThrow<SteamSettings>('steam');
    const url = `${STEAM_WEB_API_URL}/IStoreService/GetAppList/v1/`;
    const apps: SteamApp[] = [];
    let lastAppId: number | undefined;
    let page = 0;

    try {
      for (;;) {
        await this.rateLimiter.acquire();
        page += 1;
        const response = await firstValueFrom(
          this.httpService.get<StoreAppListResponse>(url, {
            params: {
              key: api_key,
              include_games: false,
              include_dlc: true,
              include_software: true,
              include_videos: false,
              include_hardware: false,
              max_results: APP_LIST_PAGE_SIZE,
              ...(lastAppId !== undefined ? { last_appid: lastAppId } : {}),
            },
          }),
        );

        const body = response.data?.response;
        if (!body || typeof body !== 'object') {
          throw new Error('GetAppList 응답에 response 객체가 없습니다');
        }

        for (const app of body.apps ?? []) {
          const appid = String(app.appid);
          if (!NUMERIC_APP_ID.test(appid)) continue;
          apps.push({ appid, name: app.name ?? '' });
        }
        this.logger.debug(
          `📄 GetAppList 페이지 ${page}: ${body.apps?.length ?? 0}개 (누적 ${apps.length})`,
        );

        if (!body.have_more_results || body.last_appid === undefined) break;
        if (body.last_appid === lastAppId) {
          this.logger.warn(`⚠️ GetAppList last_appid 가 진행되지 않음 (${lastAppId}), 수집 중단`);
          break;
        }
        lastAppId = body.last_appid;
      }
    } catch (error) {
      throw new PipelineError(
        PipelineErrorCode.CATALOG_FETCH_FAILED,
        `Failed to fetch software list: ${describeError(error)}`,
        error,
      );
    }

    return apps;
  }

  /**
   * 카탈로그 파일 동기화
   * @returns 기존 + 신규 AppID 합집합
   */
  async syncSoftwareCatalog(): Promise<Set<AppId>> {
    const known = await this.catalogFile.readKnownIds();
    const apps = await this.fetchSoftwareAndDlc();
    const added = await this.catalogFile.appendNew(apps, known);

    this.logger.debug(
      `✅ 카탈로그 동기화: 기존 ${known.size}개 + 신규 ${added.length}개`,
    );
    const catalog = new Set(known);
    for (const app of added) catalog.add(app.appid);
    return catalog;
  }
}
