/**
 * Steam API 관련 타입 정의 (snake_case는 응답 필드 그대로)
 */
import { QueuePlatformCode } from '../steam/steam.constants';

/** AppID는 숫자 문자열 그대로 다룬다 */
export type AppId = string;

export interface SteamApp {
  appid: AppId;
  name: string;
}

// IStoreService/GetAppList/v1 응답
export interface StoreAppListResponse {
  response?: {
    apps?: Array<{
      appid?: number;
      name?: string;
      last_modified?: number;
      price_change_number?: number;
    }>;
    have_more_results?: boolean;
    last_appid?: number;
  };
}

// store.steampowered.com/api/appdetails 응답 (AppID 키)
export interface SteamAppDetailsResponse {
  [app_id: string]:
    | {
        success?: boolean;
        data?: SteamAppDetailsData;
      }
    | undefined;
}

export interface SteamAppDetailsData {
  type?: string;
  name?: string;
  steam_appid?: number;
  is_free?: boolean;
  drm_notice?: string;
  platforms?: {
    windows?: boolean;
    mac?: boolean;
    linux?: boolean;
  };
}

/**
 * 상세 조회 결과 분류
 */
export interface AppClassification {
  appId: AppId;
  name: string;
  /** 예: "Win/Mac [DENUVO]", "Unknown" */
  platformSummary: string;
  queuePlatforms: QueuePlatformCode[];
  hasDenuvo: boolean;
  isFree: boolean;
}
