// src/weather/services/fetch-orchestrator.service.ts

import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AxiosInstance } from 'axios';
import { AdapterMapper } from '../../common/utils/adapter-mapper.util';
import { WeatherSourceAdapter } from '../adapters/weather-source.adapter.interface';
import { Coordinate, FetchMode, GeocodeCache, Observation } from '../interfaces/weather.interface';
import { describeFailure } from '../interfaces/source-result.interface';
import { GeocodeResolverService } from './geocode-resolver.service';

/** 共享 HTTP 客户端的注入令牌 */
export const WEATHER_HTTP_CLIENT = 'WEATHER_HTTP_CLIENT';

/** 单个数据源调用的默认截止时间（包含地理编码 + 天气请求） */
export const DEFAULT_SOURCE_TIMEOUT_MS = 15000;

/**
 * 读取正整数配置，无效时使用默认值
 */
export function readPositiveInt(configService: ConfigService, key: string, fallback: number): number {
  const parsed = Number(configService.get<string | number>(key));
  return Number.isInteger(parsed) && parsed > 0 ? parsed : fallback;
}

/**
 * 获取编排器
 *
 * 每批次：
 * 1. 预先解析一次城市坐标，写入本批次的缓存（分发前写、分发期间只读）
 * 2. 并发或顺序调用全部数据源，共享同一个 HTTP 客户端
 * 3. 每个调用单独计时、单独超时，结果顺序与数据源顺序一致
 */
@Injectable()
export class FetchOrchestratorService {
  private readonly logger = new Logger(FetchOrchestratorService.name);
  private readonly sourceTimeoutMs: number;

  constructor(
    @Inject(WEATHER_HTTP_CLIENT) private readonly session: AxiosInstance,
    private readonly geocoder: GeocodeResolverService,
    private readonly configService: ConfigService,
  ) {
    this.sourceTimeoutMs = readPositiveInt(
      this.configService,
      'WEATHER_SOURCE_TIMEOUT_MS',
      DEFAULT_SOURCE_TIMEOUT_MS,
    );
  }

  async fetch(city: string, sources: WeatherSourceAdapter[], mode: FetchMode): Promise<Observation[]> {
    return mode === 'sequential'
      ? this.fetchSequentially(city, sources)
      : this.fetchConcurrently(city, sources);
  }

  /**
   * 并发获取：全部调用同时发出，等待全部完成（不会因单个失败提前结束）
   */
  async fetchConcurrently(city: string, sources: WeatherSourceAdapter[]): Promise<Observation[]> {
    const cache = await this.prepareGeocodeCache(city);
    return Promise.all(sources.map((source) => this.timedFetch(source, city, cache)));
  }

  /**
   * 顺序获取：按声明顺序逐个调用，用于与并发模式对比耗时
   */
  async fetchSequentially(city: string, sources: WeatherSourceAdapter[]): Promise<Observation[]> {
    const cache = await this.prepareGeocodeCache(city);
    const results: Observation[] = [];
    for (const source of sources) {
      results.push(await this.timedFetch(source, city, cache));
    }
    return results;
  }

  /**
   * 预解析坐标
   *
   * 失败时缓存保持为空，由各个需要坐标的数据源自行解析并报告错误
   */
  private async prepareGeocodeCache(city: string): Promise<GeocodeCache> {
    const cache = new Map<string, Coordinate>();
    const result = await this.geocoder.resolve(city, this.session);
    if (result.ok) {
      cache.set(city, result.value);
    } else {
      this.logger.debug(`预解析坐标失败 (${city}): ${describeFailure(result.error)}`);
    }
    return cache;
  }

  /**
   * 带计时和截止时间的单次调用
   */
  private async timedFetch(
    source: WeatherSourceAdapter,
    city: string,
    cache: GeocodeCache,
  ): Promise<Observation> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.sourceTimeoutMs);
    const start = performance.now();

    // 数据源不响应 signal 时也按时返回
    const deadline = new Promise<Observation>((resolve) => {
      controller.signal.addEventListener('abort', () =>
        resolve(this.failedObservation(source, 'timeout')),
      { once: true });
    });

    try {
      const observation = await Promise.race([
        source.fetch(city, this.session, cache, controller.signal),
        deadline,
      ]);
      return { ...observation, durationMs: performance.now() - start };
    } catch (error) {
      // 适配器约定不抛异常，这里兜底保证每个数据源都有一条结果
      const detail = AdapterMapper.extractErrorMessage(error);
      this.logger.error(`${source.getName()} 抛出了异常: ${detail}`);
      return {
        ...this.failedObservation(source, `data parsing error: ${detail}`),
        durationMs: performance.now() - start,
      };
    } finally {
      clearTimeout(timer);
    }
  }

  private failedObservation(source: WeatherSourceAdapter, error: string): Observation {
    return {
      source: source.getName(),
      temperature: 0,
      humidity: null,
      condition: '',
      error,
      durationMs: null,
    };
  }
}
