// src/weather/services/geocode-resolver.service.ts

import { Injectable } from '@nestjs/common';
import { AxiosInstance } from 'axios';
import { AdapterMapper } from '../../common/utils/adapter-mapper.util';
import { Coordinate, GeocodeCache } from '../interfaces/weather.interface';
import { SourceFailure, SourceResult, fail, ok } from '../interfaces/source-result.interface';
import { requestJson } from '../utils/http-json.util';

export const GEOCODING_URL = 'https://geocoding-api.open-meteo.com/v1/search';

/**
 * 地理编码服务（Open-Meteo Geocoding API）
 *
 * 只取第一个匹配结果，不做同名城市消歧
 */
@Injectable()
export class GeocodeResolverService {
  /**
   * 城市名 -> 坐标
   */
  async resolve(
    city: string,
    session: AxiosInstance,
    signal?: AbortSignal,
  ): Promise<SourceResult<Coordinate>> {
    const response = await requestJson(session, GEOCODING_URL, {
      params: { name: city, count: 1 },
      signal,
    });
    if (!response.ok) {
      return fail<SourceFailure>({ kind: 'geocoding', cause: response.error });
    }

    const first = AdapterMapper.asRecord(AdapterMapper.firstItem(response.value.results));
    if (!first) {
      return fail<SourceFailure>({ kind: 'city-not-found' });
    }

    const latitude = first.latitude;
    const longitude = first.longitude;
    if (typeof latitude !== 'number' || typeof longitude !== 'number') {
      return fail<SourceFailure>({ kind: 'parsing', detail: 'geocoding result has no coordinates' });
    }
    return ok({ latitude, longitude });
  }

  /**
   * 优先读缓存，未命中时自行解析（不写回缓存）
   */
  async getCoordinates(
    city: string,
    session: AxiosInstance,
    cache: GeocodeCache,
    signal?: AbortSignal,
  ): Promise<SourceResult<Coordinate>> {
    const cached = cache.get(city);
    if (cached) {
      return ok(cached);
    }
    return this.resolve(city, session, signal);
  }
}
