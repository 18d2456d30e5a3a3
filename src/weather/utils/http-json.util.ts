// src/weather/utils/http-json.util.ts

import { AxiosInstance, AxiosResponse } from 'axios';
import { AdapterMapper } from '../../common/utils/adapter-mapper.util';
import { RequestFailure, SourceResult, fail, ok } from '../interfaces/source-result.interface';

/**
 * 发送 GET 请求并返回 JSON 对象
 *
 * 不抛异常：超时、非 2xx、网络错误、非 JSON 响应都转换为 RequestFailure
 */
export async function requestJson(
  session: AxiosInstance,
  url: string,
  options: { params?: Record<string, string | number>; signal?: AbortSignal } = {},
): Promise<SourceResult<Record<string, unknown>, RequestFailure>> {
  let response: AxiosResponse<unknown>;
  try {
    response = await session.get<unknown>(url, {
      params: options.params,
      signal: options.signal,
    });
  } catch (error) {
    return fail(AdapterMapper.toRequestFailure(error));
  }

  // axios 解析 JSON 失败时会静默返回原始字符串
  const body = AdapterMapper.asRecord(response.data);
  if (!body) {
    return fail<RequestFailure>({ kind: 'invalid-json' });
  }
  return ok(body);
}
