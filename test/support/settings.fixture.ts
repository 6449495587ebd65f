import { ConfigService } from '@nestjs/config';
import { promises as fs } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { parseSettings } from '../../src/config/settings.loader';
import { Settings } from '../../src/config/settings.schema';

export interface SettingsOverrides {
  steam?: Record<string, unknown>;
  api?: Record<string, unknown>;
  platforms?: Record<string, unknown>;
  operation?: Record<string, unknown>;
  files?: Record<string, unknown>;
  drm?: Record<string, unknown>;
}

export async function createWorkDir(): Promise<string> {
  return fs.mkdtemp(join(tmpdir(), 'steam-queue-'));
}

export async function removeWorkDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

/**
 * 작업 디렉터리 기준 검증된 Settings
 */
export function buildSettings(
  dir: string,
  overrides: SettingsOverrides = {},
): Settings {
  return parseSettings(
    {
      steam: { steam_id: 'test-user', api_key: 'test-secret', ...overrides.steam },
      api: { rate_limit: 0, timeout: 10, ...overrides.api },
      platforms: { windows: true, mac: false, linux: false, ...overrides.platforms },
      operation: {
        queue_from_file: false,
        test_mode: false,
        test_limit: 10,
        verbose_logging: false,
        enable_logging: false,
        ...overrides.operation,
      },
      files: {
        software_file: join(dir, 'software.txt'),
        games_file: join(dir, 'games.txt'),
        queue_file: join(dir, 'queue.txt'),
        input_file: join(dir, 'input.txt'),
        log_file: join(dir, 'logs', 'run.log'),
        language_file: join(dir, 'language.txt'),
        ...overrides.files,
      },
      ...(overrides.drm ? { drm: overrides.drm } : {}),
    },
    {},
  );
}

export function createConfigService(settings: Settings): ConfigService {
  return new ConfigService({ ...settings });
}
