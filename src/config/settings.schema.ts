import { Type } from 'class-transformer';
import {
  ArrayNotEmpty,
  IsArray,
  IsBoolean,
  IsDefined,
  IsInt,
  IsNotEmpty,
  IsNumber,
  IsOptional,
  IsPositive,
  IsString,
  Min,
  ValidateNested,
} from 'class-validator';
import { DEFAULT_DENUVO_STRINGS } from '../steam/steam.constants';

/**
 * settings.json 스키마
 * 키 이름은 파일 포맷(snake_case) 그대로 유지한다.
 */
export class SteamSettings {
  /** 커뮤니티 커스텀 URL 또는 17자리 SteamID64 */
  @IsString()
  steam_id = '';

  @IsString()
  api_key = '';
}

export class ApiSettings {
  /** 외부 호출 사이 최소 간격 (초) */
  @IsNumber({}, { message: 'api.rate_limit은 숫자여야 합니다' })
  @Min(0)
  rate_limit!: number;

  /** 상세 조회 타임아웃 (초) */
  @IsNumber({}, { message: 'api.timeout은 숫자여야 합니다' })
  @IsPositive()
  timeout!: number;
}

export class PlatformSettings {
  @IsBoolean()
  windows!: boolean;

  @IsBoolean()
  mac!: boolean;

  @IsBoolean()
  linux!: boolean;
}

export class OperationSettings {
  @IsOptional()
  @IsBoolean()
  filter_denuvo = true;

  @IsBoolean()
  queue_from_file = false;

  @IsBoolean()
  test_mode = false;

  @IsInt({ message: 'operation.test_limit은 정수여야 합니다' })
  @Min(1)
  test_limit = 10;

  @IsBoolean()
  verbose_logging = false;

  @IsBoolean()
  enable_logging = true;

  @IsString()
  @IsNotEmpty()
  display_language = 'english';
}

export class FilesSettings {
  @IsString()
  @IsNotEmpty()
  software_file!: string;

  @IsString()
  @IsNotEmpty()
  games_file!: string;

  @IsString()
  @IsNotEmpty()
  queue_file!: string;

  @IsString()
  @IsNotEmpty()
  input_file!: string;

  @IsString()
  @IsNotEmpty()
  log_file!: string;

  @IsString()
  @IsNotEmpty()
  language_file = 'language.txt';
}

export class DrmSettings {
  /** drm_notice 대소문자 무시 부분 일치 패턴 */
  @IsArray()
  @ArrayNotEmpty()
  @IsString({ each: true })
  denuvo_strings: string[] = [...DEFAULT_DENUVO_STRINGS];
}

export class Settings {
  @ValidateNested()
  @Type(() => SteamSettings)
  steam: SteamSettings = new SteamSettings();

  @IsDefined()
  @ValidateNested()
  @Type(() => ApiSettings)
  api!: ApiSettings;

  @IsDefined()
  @ValidateNested()
  @Type(() => PlatformSettings)
  platforms!: PlatformSettings;

  @ValidateNested()
  @Type(() => OperationSettings)
  operation: OperationSettings = new OperationSettings();

  @IsDefined()
  @ValidateNested()
  @Type(() => FilesSettings)
  files!: FilesSettings;

  @ValidateNested()
  @Type(() => DrmSettings)
  drm: DrmSettings = new DrmSettings();
}
