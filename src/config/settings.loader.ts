import { promises as fs } from 'fs';
import { plainToInstance } from 'class-transformer';
import { validateSync, ValidationError } from 'class-validator';
import { SettingsError } from '../common/errors/pipeline.errors';
import { Settings } from './settings.schema';

export const DEFAULT_SETTINGS_PATH = 'settings.json';

type PlainObject = Record<string, unknown>;

function isPlainObject(value: unknown): value is PlainObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * settings.json 로드 + 검증
 * - STEAM_API_KEY / STEAM_ID 환경 변수가 있으면 파일 값보다 우선
 * - 일반 모드에서는 steam_id, api_key가 필수
 */
export async function loadSettings(
  path: string = DEFAULT_SETTINGS_PATH,
  env: NodeJS.ProcessEnv = process.env,
): Promise<Settings> {
  let raw: string;
  try {
    raw = await fs.readFile(path, 'utf-8');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new SettingsError(`Error loading settings: ${path} (${reason})`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new SettingsError(`Error loading settings: invalid JSON in ${path} (${reason})`);
  }

  return parseSettings(parsed, env);
}

export function parseSettings(
  parsed: unknown,
  env: NodeJS.ProcessEnv = process.env,
): Settings {
  if (!isPlainObject(parsed)) {
    throw new SettingsError('Error loading settings: root must be a JSON object');
  }

  const steam: PlainObject = isPlainObject(parsed.steam) ? { ...parsed.steam } : {};
  if (env.STEAM_API_KEY) steam.api_key = env.STEAM_API_KEY;
  if (env.STEAM_ID) steam.steam_id = env.STEAM_ID;

  const settings = plainToInstance(Settings, { ...parsed, steam });
  const errors = validateSync(settings, { whitelist: true });
  if (errors.length > 0) {
    const details = flattenValidationErrors(errors);
    throw new SettingsError(
      `Error loading settings: ${details.join('; ')}`,
      details,
    );
  }

  if (!settings.operation.queue_from_file) {
    const missing = [
      !settings.steam.steam_id.trim() ? 'steam.steam_id' : null,
      !settings.steam.api_key.trim() ? 'steam.api_key' : null,
    ].filter((key): key is string => key !== null);
    if (missing.length > 0) {
      throw new SettingsError(
        `Error loading settings: ${missing.join(', ')} required unless operation.queue_from_file is enabled`,
        missing,
      );
    }
  }

  return settings;
}

export function flattenValidationErrors(
  errors: ValidationError[],
  parentPath = '',
): string[] {
  return errors.flatMap((error) => {
    const path = parentPath ? `${parentPath}.${error.property}` : error.property;
    const own = Object.values(error.constraints ?? {}).map(
      (message) => `${path}: ${message}`,
    );
    return [...own, ...flattenValidationErrors(error.children ?? [], path)];
  });
}
