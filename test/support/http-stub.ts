import { HttpService } from '@nestjs/axios';
import axios, { AxiosError, InternalAxiosRequestConfig } from 'axios';

export type StubResponder = (
  config: InternalAxiosRequestConfig,
) => unknown | Promise<unknown>;

/**
 * 네트워크 없이 응답을 돌려주는 axios adapter 기반 HttpService
 */
export function createHttpServiceStub(responder: StubResponder) {
  const requests: InternalAxiosRequestConfig[] = [];
  const instance = axios.create({
    adapter: async (config) => {
      requests.push(config);
      const data = await responder(config);
      return { data, status: 200, statusText: 'OK', headers: {}, config };
    },
  });
  return { httpService: new HttpService(instance), requests };
}

export function httpStatusError(
  config: InternalAxiosRequestConfig,
  status: number,
): AxiosError {
  return new AxiosError(
    `Request failed with status code ${status}`,
    AxiosError.ERR_BAD_RESPONSE,
    config,
    null,
    { data: '', status, statusText: 'Error', headers: {}, config },
  );
}

export function timeoutError(config: InternalAxiosRequestConfig): AxiosError {
  return new AxiosError(
    `timeout of ${config.timeout ?? 0}ms exceeded`,
    AxiosError.ECONNABORTED,
    config,
  );
}

/** params.appids 등 쿼리 값 읽기 */
export function queryParam(
  config: InternalAxiosRequestConfig,
  name: string,
): string | undefined {
  const params: unknown = config.params;
  if (typeof params !== 'object' || params === null) return undefined;
  const value: unknown = Object.entries(params).find(([key]) => key === name)?.[1];
  return value === undefined ? undefined : String(value);
}
