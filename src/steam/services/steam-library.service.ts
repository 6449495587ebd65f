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
import { AppId } from '../../types/steam.types';
import { STEAM_COMMUNITY_URL, STEAM_RATE_LIMITER } from '../steam.constants';
import { parseLibraryXml } from '../utils/library-xml.util';

const STEAM_ID64_PATTERN = /^\d{17}$/;

/** 커스텀 URL은 /id/, 17자리 SteamID64는 /profiles/ */
export function buildLibraryUrl(steamId: string): string {
  const segment = STEAM_ID64_PATTERN.test(steamId) ? 'profiles' : 'id';
  return `${STEAM_COMMUNITY_URL}/${segment}/${encodeURIComponent(steamId)}/games?tab=all&xml=1`;
}

/**
 * Steam 커뮤니티 공개 라이브러리 조회 (XML)
 */
@Injectable()
export class SteamLibraryService {
  private readonly logger = new Logger(SteamLibraryService.name);

  constructor(
    private readonly httpService: HttpService,
    private readonly configService: ConfigService,
    @Inject(STEAM_RATE_LIMITER)
    private readonly rateLimiter: IntervalRateLimiter,
  ) {}

  /**
   * 보유 게임 목록 (원본 순서 유지)
   */
  async fetchOwnedGames(): Promise<Map<AppId, string>> {
    const { steam_id } = this.configService.getOrThrow<SteamSettings>('steam');
    const url = buildLibraryUrl(steam_id);

    try {
      await this.rateLimiter.acquire();
      const response = await firstValueFrom(
        this.httpService.get<string>(url, { responseType: 'text' }),
      );
      if (typeof response.data !== 'string') {
        throw new Error('라이브러리 응답이 텍스트가 아닙니다');
      }

      const library = parseLibraryXml(response.data);
      this.logger.debug(`📚 라이브러리 XML 파싱: ${library.size}개`);
      return library;
    } catch (error) {
      throw new PipelineError(
        PipelineErrorCode.LIBRARY_FETCH_FAILED,
        `Failed to fetch games list: ${describeError(error)}`,
        error,
      );
    }
  }
}
