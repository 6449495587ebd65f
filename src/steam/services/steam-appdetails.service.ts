import { Inject, Injectable, Logger } from '@nestjs/common';
import { HttpService } from '@nestjs/axios';
import { ConfigService } from '@nestjs/config';
import { firstValueFrom } from 'rxjs';
import { IntervalRateLimiter } from '../../common/concurrency/interval-rate-limiter';
import { describeError } from '../../common/errors/pipeline.errors';
import {
  ApiSettings,
  DrmSettings,
  OperationSettings,
  PlatformSettings,
} from '../../config/settings.schema';
import {
  AppClassification,
  AppId,
  SteamAppDetailsResponse,
} from '../../types/steam.types';
import { STEAM_RATE_LIMITER, STEAM_STORE_API_URL } from '../steam.constants';
import {
  ClassificationPolicy,
  classifyAppDetails,
  unknownClassification,
} from '../utils/app-classification.util';

/**
 * Steam AppDetails 서비스
 *
 * 역할: 게임 하나의 플랫폼 / 무료 여부 / DRM 안내문을 조회해 분류
 * 특징: 전역 Rate Limiter 적용, 타임아웃 적용, 실패는 Unknown 분류로 흡수
 */
@Injectable()
export class SteamAppDetailsService {
  private readonly logger = new Logger(SteamAppDetailsService.name);
  private readonly policy: ClassificationPolicy;
  private readonly timeoutMs: number;

  constructor(
    private readonly httpService: HttpService,
    configService: ConfigService,
    @Inject(STEAM_RATE_LIMITER)
    private readonly rateLimiter: IntervalRateLimiter,
  ) {
    const platforms = configService.getOrThrow<PlatformSettings>('platforms');
    const operation = configService.getOrThrow<OperationSettings>('operation');
    const drm = configService.getOrThrow<DrmSettings>('drm');
    const api = configService.getOrThrow<ApiSettings>('api');

    this.policy = {
      platforms: {
        windows: platforms.windows,
        mac: platforms.mac,
        linux: platforms.linux,
      },
      filterDenuvo: operation.filter_denuvo,
      denuvoStrings: drm.denuvo_strings,
    };
    this.timeoutMs = Math.round(api.timeout * 1000);
  }

  /**
   * AppDetails 조회 + 분류
   * API: https://store.steampowered.com/api/appdetails?appids={appid}
   *
   * 예외를 던지지 않는다.
   */
  async classify(appId: AppId): Promise<AppClassification> {
    await this.rateLimiter.acquire();

    try {
      const response = await firstValueFrom(
        this.httpService.get<SteamAppDetailsResponse>(
          `${STEAM_STORE_API_URL}/appdetails`,
          {
            params: { appids: appId },
            timeout: this.timeoutMs,
          },
        ),
      );

      const entry = response.data?.[appId];
      if (!entry?.success || !entry.data) {
        this.logger.debug(`🔍 AppID ${appId}: 상세 정보 없음 → Unknown`);
        return unknownClassification(appId);
      }

      const classification = classifyAppDetails(appId, entry.data, this.policy);
      this.logger.debug(
        `🎮 ${classification.name} | Free: ${classification.isFree} | Denuvo: ${classification.hasDenuvo}`,
      );
      return classification;
    } catch (error) {
      this.logger.debug(
        `⚠️ AppID ${appId} 상세 조회 실패: ${describeError(error)}`,
      );
      return unknownClassification(appId);
    }
  }
}
