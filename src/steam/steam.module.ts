import { Module } from '@nestjs/common';
import { HttpModule } from '@nestjs/axios';
import { ConfigService } from '@nestjs/config';
import { CLOCK, Clock, systemClock } from '../common/concurrency/clock';
import { IntervalRateLimiter } from '../common/concurrency/interval-rate-limiter';
import { ApiSettings } from '../config/settings.schema';
import { PipelinePersistenceModule } from '../pipeline/persistence/pipeline-persistence.module';
import { SteamAppDetailsService } from './services/steam-appdetails.service';
import { SteamAppListService } from './services/steam-applist.service';
import { SteamLibraryService } from './services/steam-library.service';
import { REQUEST_USER_AGENT, STEAM_RATE_LIMITER } from './steam.constants';

/**
 * Steam API 모듈
 *
 * 구성:
 * - SteamAppListService: 소프트웨어/DLC 카탈로그 (GetAppList)
 * - SteamLibraryService: 커뮤니티 라이브러리 XML
 * - SteamAppDetailsService: AppDetails 분류
 * - STEAM_RATE_LIMITER: 세 서비스가 공유하는 단일 간격 리미터
 */
@Module({
  imports: [
    HttpModule.register({
      timeout: 120000, // 카탈로그/라이브러리 (대용량 응답)
      maxRedirects: 3,
      headers: { 'User-Agent': REQUEST_USER_AGENT },
    }),
    PipelinePersistenceModule,
  ],
  providers: [
    { provide: CLOCK, useValue: systemClock },
    {
      provide: STEAM_RATE_LIMITER,
      inject: [ConfigService, CLOCK],
      useFactory: (configService: ConfigService, clock: Clock) => {
        const api = configService.getOrThrow<ApiSettings>('api');
        return new IntervalRateLimiter(Math.round(api.rate_limit * 1000), clock);
      },
    },
    SteamAppListService,
    SteamLibraryService,
    SteamAppDetailsService,
  ],
  exports: [
    CLOCK,
    SteamAppListService,
    SteamLibraryService,
    SteamAppDetailsService,
  ],
})
export class SteamModule {}
