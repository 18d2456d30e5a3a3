// src/weather/adapters/base.adapter.ts

import { Logger } from '@nestjs/common';
import { AxiosInstance } from 'axios';
import { AdapterMapper } from '../../common/utils/adapter-mapper.util';
import { GeocodeCache, Observation } from '../interfaces/weather.interface';
import {
  SourceFailure,
  SourceResult,
  describeFailure,
  fail,
} from '../interfaces/source-result.interface';
import { WeatherSourceAdapter } from './weather-source.adapter.interface';

/**
 * 单次调用的上下文
 */
export interface FetchContext {
  session: AxiosInstance;
  geocodeCache: GeocodeCache;
  signal?: AbortSignal;
}

/**
 * 适配器解析出的读数
 */
export interface WeatherReading {
  temperature: number;
  humidity: number | null;
  condition: string;
}

/**
 * 基础天气适配器
 *
 * 提供通用的功能：
 * - API Key 检查
 * - 失败 -> Observation.error 的转换
 * - 日志记录
 */
export abstract class BaseWeatherAdapter implements WeatherSourceAdapter {
  protected readonly logger: Logger;

  constructor(adapterName: string, protected readonly apiKey: string = '') {
    this.logger = new Logger(adapterName);
  }

  abstract getName(): string;

  /**
   * 是否需要 API Key（需要 Key 的数据源覆盖为 true）
   */
  requiresApiKey(): boolean {
    return false;
  }

  async fetch(
    city: string,
    session: AxiosInstance,
    geocodeCache: GeocodeCache,
    signal?: AbortSignal,
  ): Promise<Observation> {
    if (this.requiresApiKey() && !this.apiKey) {
      return this.toObservation(fail<SourceFailure>({ kind: 'missing-credential' }));
    }

    const result = await this.safeRequest(
      () => this.fetchReading(city, { session, geocodeCache, signal }),
      `获取 ${this.getName()} 天气失败`,
    );
    return this.toObservation(result);
  }

  /**
   * 请求并解析数据源响应
   */
  protected abstract fetchReading(
    city: string,
    context: FetchContext,
  ): Promise<SourceResult<WeatherReading>>;

  /**
   * 安全执行请求，意外异常按解析错误处理
   */
  protected async safeRequest(
    requestFn: () => Promise<SourceResult<WeatherReading>>,
    errorContext: string,
  ): Promise<SourceResult<WeatherReading>> {
    try {
      const result = await requestFn();
      if (!result.ok) {
        this.logger.warn(`${errorContext}: ${describeFailure(result.error)}`);
      }
      return result;
    } catch (error) {
      const detail = AdapterMapper.extractErrorMessage(error);
      this.logger.error(`${errorContext}: ${detail}`);
      return fail<SourceFailure>({ kind: 'parsing', detail });
    }
  }

  /**
   * 坐标保留 4 位小数
   */
  protected formatCoordinate(value: number): string {
    return value.toFixed(4);
  }

  /**
   * 缺少顶层字段时的解析错误
   */
  protected missingField(field: string): SourceResult<WeatherReading> {
    return fail<SourceFailure>({ kind: 'parsing', detail: `missing ${field}` });
  }

  private toObservation(result: SourceResult<WeatherReading>): Observation {
    if (result.ok) {
      return {
        source: this.getName(),
        temperature: result.value.temperature,
        humidity: result.value.humidity,
        condition: result.value.condition,
        error: null,
        durationMs: null,
      };
    }
    return {
      source: this.getName(),
      temperature: 0,
      humidity: null,
      condition: '',
      error: describeFailure(result.error),
      durationMs: null,
    };
  }
}
