import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { CLOCK, Clock } from '../common/concurrency/clock';
import { describeError } from '../common/errors/pipeline.errors';
import { formatHms } from '../common/utils/duration.util';
import { LoggerHelper } from '../common/utils/logger.helper';
import { ApiSettings, OperationSettings } from '../config/settings.schema';
import { LanguageTableService } from '../i18n/language-table.service';
import { SteamAppDetailsService } from '../steam/services/steam-appdetails.service';
import { SteamAppListService } from '../steam/services/steam-applist.service';
import { SteamLibraryService } from '../steam/services/steam-library.service';
import { QUEUE_VISIBILITY } from '../steam/steam.constants';
import { AppId } from '../types/steam.types';
import {
  CONFIRMATION_PROVIDER,
  ConfirmationProvider,
} from './confirmation/confirmation.provider';
import { formatGamesLogLine } from './persistence/line-format.util';
import { GamesLogService } from './persistence/services/games-log.service';
import { InputListService } from './persistence/services/input-list.service';
import { QueueFileService } from './persistence/services/queue-file.service';
import { ProgressTracker } from './progress/progress-tracker';
import {
  PipelineRunResult,
  PipelineState,
  RunAccumulator,
} from './types/pipeline.types';

/**
 * 큐 생성 파이프라인
 *
 * Idle → ComputingWorkList → AwaitingConfirmation → Running
 *   → (Completed | TestLimitReached) → Finalizing → Done
 * 어느 단계든 실패 시 Error (run()은 예외를 던지지 않는다)
 *
 * 파일 쓰기는 Finalizing 단계에서만 일어난다.
 */
@Injectable()
export class QueuePipelineService {
  private readonly logger = new Logger(QueuePipelineService.name);
  private currentState: PipelineState = 'Idle';

  constructor(
    private readonly configService: ConfigService,
    private readonly strings: LanguageTableService,
    private readonly appListService: SteamAppListService,
    private readonly libraryService: SteamLibraryService,
    private readonly appDetailsService: SteamAppDetailsService,
    private readonly gamesLog: GamesLogService,
    private readonly queueFile: QueueFileService,
    private readonly inputList: InputListService,
    @Inject(CONFIRMATION_PROVIDER)
    private readonly confirmation: ConfirmationProvider,
    @Inject(CLOCK)
    private readonly clock: Clock,
  ) {}

  get state(): PipelineState {
    return this.currentState;
  }

  async run(): Promise<PipelineRunResult> {
    const operation = this.configService.getOrThrow<OperationSettings>('operation');
    const acc: RunAccumulator = {
      gamesLogLines: [],
      queueEntries: [],
      denuvoCount: 0,
      processed: 0,
    };

    try {
      this.transition('ComputingWorkList');
      LoggerHelper.logStart(this.logger, '작업 목록 계산', {
        mode: operation.queue_from_file ? 'file' : 'library',
      });
      const workList = operation.queue_from_file
        ? await this.readWorkListFromFile()
        : await this.computeWorkListFromLibrary();

      if (workList.length === 0) {
        this.logger.log(this.strings.get('no_games'));
        this.transition('Done');
        return this.result('no-games', acc);
      }

      this.transition('AwaitingConfirmation');
      const total = operation.test_mode
        ? Math.min(workList.length, operation.test_limit)
        : workList.length;
      await this.awaitConfirmation(total);

      this.transition('Running');
      const limitReached = await this.processWorkList(workList, total, operation, acc);
      this.transition(limitReached ? 'TestLimitReached' : 'Completed');

      this.transition('Finalizing');
      await this.finalize(acc, operation.queue_from_file);

      this.transition('Done');
      return this.result(limitReached ? 'test-limit-reached' : 'completed', acc);
    } catch (error) {
      this.transition('Error');
      const message = describeError(error);
      this.logger.error(this.strings.format('error', message));
      return { ...this.result('failed', acc), error: message };
    }
  }

  private async readWorkListFromFile(): Promise<AppId[]> {
    this.logger.log(this.strings.get('fetching_games'));
    return this.inputList.readAppIds();
  }

  /**
   * 보유 게임 - 소프트웨어 카탈로그 - 이미 처리된 게임 (라이브러리 순서 유지)
   */
  private async computeWorkListFromLibrary(): Promise<AppId[]> {
    const alreadyProcessed = await this.gamesLog.readProcessedIds();

    this.logger.log(this.strings.get('start_processing'));
    this.logger.log(this.strings.get('fetching_software'));
    const catalog = await this.appListService.syncSoftwareCatalog();

    this.logger.log(this.strings.get('fetching_games'));
    const library = await this.libraryService.fetchOwnedGames();
    this.logger.log(this.strings.format('found_games', library.size));

    const workList = [...library.keys()].filter(
      (appId) => !catalog.has(appId) && !alreadyProcessed.has(appId),
    );
    LoggerHelper.logComplete(this.logger, '작업 목록 계산', {
      library: library.size,
      catalog: catalog.size,
      processed: alreadyProcessed.size,
      pending: workList.length,
    });
    return workList;
  }

  private async awaitConfirmation(total: number): Promise<void> {
    const { rate_limit } = this.configService.getOrThrow<ApiSettings>('api');
    this.logger.log(this.strings.format('processing_ready', total));
    this.logger.log(
      this.strings.format('estimated_time', formatHms(total * rate_limit)),
    );
    await this.confirmation.confirm(this.strings.get('press_enter'));
  }

  /**
   * @returns 테스트 모드 한도에 도달해 중단했으면 true
   */
  private async processWorkList(
    workList: AppId[],
    total: number,
    operation: OperationSettings,
    acc: RunAccumulator,
  ): Promise<boolean> {
    const progress = new ProgressTracker(total, this.clock.now());

    for (const appId of workList) {
      if (operation.test_mode && acc.processed >= operation.test_limit) {
        this.logger.log(
          this.strings.format('test_mode_limit', operation.test_limit),
        );
        return true;
      }

      const snapshot = progress.snapshot(
        acc.processed,
        acc.denuvoCount,
        this.clock.now(),
      );
      this.logger.log(
        this.strings.format(
          'progress',
          snapshot.percent,
          snapshot.remaining,
          snapshot.processed,
          snapshot.total,
          snapshot.denuvoCount,
        ),
      );

      const classification = await this.appDetailsService.classify(appId);
      acc.gamesLogLines.push(formatGamesLogLine(classification));
      for (const platformCode of classification.queuePlatforms) {
        acc.queueEntries.push({ platformCode, appId, visibility: QUEUE_VISIBILITY });
      }
      if (classification.hasDenuvo) acc.denuvoCount += 1;
      acc.processed += 1;
    }

    return false;
  }

  private async finalize(acc: RunAccumulator, queueFromFile: boolean): Promise<void> {
    if (acc.gamesLogLines.length > 0) {
      await this.gamesLog.save(acc.gamesLogLines, queueFromFile);
      this.logger.log(
        this.strings.format(
          'added_games',
          acc.gamesLogLines.length,
          this.gamesLog.filePath,
        ),
      );
    }

    if (acc.queueEntries.length === 0) {
      this.logger.log(this.strings.get('no_valid_games'));
      return;
    }

    await this.queueFile.write(acc.queueEntries);
    this.logger.log(this.strings.format('created_queue', acc.queueEntries.length));
    if (acc.denuvoCount > 0) {
      this.logger.log(this.strings.format('skipped_denuvo', acc.denuvoCount));
    }
  }

  private transition(next: PipelineState): void {
    this.logger.debug(`🔄 상태 전이: ${this.currentState} → ${next}`);
    this.currentState = next;
  }

  private result(
    outcome: PipelineRunResult['outcome'],
    acc: RunAccumulator,
  ): PipelineRunResult {
    return {
      outcome,
      processed: acc.processed,
      queueEntries: acc.queueEntries.length,
      denuvoCount: acc.denuvoCount,
    };
  }
}
