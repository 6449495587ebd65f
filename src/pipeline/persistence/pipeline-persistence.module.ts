import { Module } from '@nestjs/common';
import { GamesLogService } from './services/games-log.service';
import { InputListService } from './services/input-list.service';
import { QueueFileService } from './services/queue-file.service';
import { SoftwareCatalogFileService } from './services/software-catalog-file.service';

/**
 * 파이프라인 산출물/입력 파일 접근
 * - 소프트웨어 카탈로그 (append-only)
 * - 처리된 게임 로그 (이어쓰기/덮어쓰기)
 * - 큐 파일 (매번 전체 재작성)
 * - 파일 모드 입력 목록
 */
@Module({
  providers: [
    SoftwareCatalogFileService,
    GamesLogService,
    QueueFileService,
    InputListService,
  ],
  exports: [
    SoftwareCatalogFileService,
    GamesLogService,
    QueueFileService,
    InputListService,
  ],
})
export class PipelinePersistenceModule {}
