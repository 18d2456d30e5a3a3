// src/common/utils/http-client.factory.ts

import axios, { AxiosInstance, AxiosRequestConfig } from 'axios';

/** 默认单次请求超时（毫秒） */
export const DEFAULT_REQUEST_TIMEOUT_MS = 10000;

/**
 * HTTP 客户端工厂
 * 
 * 统一创建和配置 axios 实例，所有数据源共享同一个实例（连接池）
 */
export class HttpClientFactory {
  /**
   * 创建标准 HTTP 客户端
   */
  static create(config: { timeout?: number } = {}): AxiosInstance {
    const axiosConfig: AxiosRequestConfig = {
      timeout: config.timeout ?? DEFAULT_REQUEST_TIMEOUT_MS,
      headers: {
        'Accept': 'application/json',
        'User-Agent': 'weather-consensus/1.0',
      },
    };

    return axios.create(axiosConfig);
  }
}
