// src/weather/testing/weather-test.helpers.ts

import axios, { AxiosError, AxiosHeaders, AxiosInstance, AxiosResponse } from 'axios';
import { readFileSync } from 'fs';
import * as path from 'path';
import { ConditionTaxonomy } from '../interfaces/condition-taxonomy.interface';
import { Coordinate, GeocodeCache, Observation } from '../interfaces/weather.interface';
import { parseConditionTaxonomy } from '../utils/condition-normalizer.util';

/**
 * 读取仓库内的 weather-codes.json
 */
export function loadTaxonomy(): ConditionTaxonomy {
  const filePath = path.join(process.cwd(), 'config', 'weather-codes.json');
  return parseConditionTaxonomy(JSON.parse(readFileSync(filePath, 'utf-8')));
}

/**
 * 构造 axios 响应
 */
export function axiosResponse<T>(data: T, status = 200): AxiosResponse<T> {
  return {
    data,
    status,
    statusText: status === 200 ? 'OK' : 'Error',
    headers: {},
    config: { headers: new AxiosHeaders() },
  };
}

/**
 * 构造非 2xx 的 axios 错误
 */
export function httpError(status: number): AxiosError {
  return new AxiosError(
    `Request failed with status code ${status}`,
    AxiosError.ERR_BAD_RESPONSE,
    undefined,
    undefined,
    axiosResponse({}, status),
  );
}

/**
 * 真实 axios 实例 + get 的 spy（不会发出网络请求）
 */
export function createMockSession(): { session: AxiosInstance; get: jest.SpyInstance } {
  const session = axios.create();
  const get = jest.spyOn(session, 'get').mockRejectedValue(new Error('unexpected request'));
  return { session, get };
}

export function cacheFor(city: string, coordinate: Coordinate): GeocodeCache {
  return new Map([[city, coordinate]]);
}

export const EMPTY_CACHE: GeocodeCache = new Map();

/**
 * 观测数据构造器
 */
export function observation(overrides: Partial<Observation> = {}): Observation {
  return {
    source: 'Test',
    temperature: 0,
    humidity: null,
    condition: '',
    error: null,
    durationMs: null,
    ...overrides,
  };
}
