import { AppId } from '../../types/steam.types';
import { QueuePlatformCode } from '../../steam/steam.constants';

export type PipelineState =
  | 'Idle'
  | 'ComputingWorkList'
  | 'AwaitingConfirmation'
  | 'Running'
  | 'Completed'
  | 'TestLimitReached'
  | 'Finalizing'
  | 'Done'
  | 'Error';

export type PipelineOutcome =
  | 'completed'
  | 'test-limit-reached'
  | 'no-games'
  | 'failed';

export interface QueueEntry {
  platformCode: QueuePlatformCode;
  appId: AppId;
  visibility: 'Public';
}

export interface PipelineRunResult {
  outcome: PipelineOutcome;
  /** 실제로 상세 조회한 개수 */
  processed: number;
  queueEntries: number;
  denuvoCount: number;
  /** outcome === 'failed' 일 때 운영자용 메시지 */
  error?: string;
}

/** 한 번의 실행에서 메모리에 쌓는 결과 */
export interface RunAccumulator {
  gamesLogLines: string[];
  queueEntries: QueueEntry[];
  denuvoCount: number;
  processed: number;
}
