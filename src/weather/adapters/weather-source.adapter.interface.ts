// src/weather/adapters/weather-source.adapter.interface.ts

import { AxiosInstance } from 'axios';
import { GeocodeCache, Observation } from '../interfaces/weather.interface';

/**
 * 天气数据源适配器接口
 * 
 * 所有天气数据源适配器都必须实现这个接口。
 * fetch 永远不会 reject：所有失败都写入 Observation.error
 */
export interface WeatherSourceAdapter {
  /**
   * 获取天气数据
   * 
   * @param city 城市名
   * @param session 共享 HTTP 客户端
   * @param geocodeCache 本批次的坐标缓存（只读）
   * @param signal 本次调用的截止信号
   */
  fetch(
    city: string,
    session: AxiosInstance,
    geocodeCache: GeocodeCache,
    signal?: AbortSignal,
  ): Promise<Observation>;

  /**
   * 获取数据源名称（用于排除过滤和展示）
   */
  getName(): string;
}
