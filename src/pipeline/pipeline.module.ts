import { Module } from '@nestjs/common';
import { SteamModule } from '../steam/steam.module';
import {
  CONFIRMATION_PROVIDER,
  ReadlineConfirmationProvider,
} from './confirmation/confirmation.provider';
import { PipelinePersistenceModule } from './persistence/pipeline-persistence.module';
import { QueuePipelineService } from './queue-pipeline.service';

/**
 * 큐 생성 파이프라인 모듈
 */
@Module({
  imports: [SteamModule, PipelinePersistenceModule],
  providers: [
    { provide: CONFIRMATION_PROVIDER, useClass: ReadlineConfirmationProvider },
    QueuePipelineService,
  ],
  exports: [QueuePipelineService],
})
export class PipelineModule {}
