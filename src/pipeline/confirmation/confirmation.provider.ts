import { Injectable } from '@nestjs/common';
import { createInterface } from 'readline/promises';

export const CONFIRMATION_PROVIDER = Symbol('CONFIRMATION_PROVIDER');

/**
 * 처리 시작 전 운영자 확인
 */
export interface ConfirmationProvider {
  confirm(prompt: string): Promise<void>;
}

/**
 * 터미널에서 Enter 입력을 기다린다 (타임아웃 없음)
 */
@Injectable()
export class ReadlineConfirmationProvider implements ConfirmationProvider {
  async confirm(prompt: string): Promise<void> {
    const rl = createInterface({ input: process.stdin, output: process.stdout });
    // readline이 Ctrl+C를 가로채므로 프로세스 SIGINT 핸들러로 넘긴다
    rl.once('SIGINT', () => process.kill(process.pid, 'SIGINT'));
    try {
      await rl.question(`\n${prompt}\n`);
    } finally {
      rl.close();
    }
  }
}

/** 확인 없이 바로 진행 (테스트/비대화형 실행) */
export class AutoConfirmationProvider implements ConfirmationProvider {
  readonly prompts: string[] = [];

  async confirm(prompt: string): Promise<void> {
    this.prompts.push(prompt);
  }
}
