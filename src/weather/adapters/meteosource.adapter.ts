// src/weather/adapters/meteosource.adapter.ts

import { AdapterMapper } from '../../common/utils/adapter-mapper.util';
import { SourceResult, ok } from '../interfaces/source-result.interface';
import { GeocodeResolverService } from '../services/geocode-resolver.service';
import { requestJson } from '../utils/http-json.util';
import { BaseWeatherAdapter, FetchContext, WeatherReading } from './base.adapter';

export const METEOSOURCE_URL = 'https://www.meteosource.com/api/v1/free/point';

/**
 * Meteosource 适配器（需要 API Key，按坐标查询）
 *
 * 免费版可能不返回湿度，或返回 "55%" 这样的字符串
 */
export class MeteosourceAdapter extends BaseWeatherAdapter {
  constructor(apiKey: string, private readonly geocoder: GeocodeResolverService) {
    super(MeteosourceAdapter.name, apiKey);
  }

  getName(): string {
    return 'Meteosource';
  }

  requiresApiKey(): boolean {
    return true;
  }

  protected async fetchReading(city: string, context: FetchContext): Promise<SourceResult<WeatherReading>> {
    const coords = await this.geocoder.getCoordinates(city, context.session, context.geocodeCache, context.signal);
    if (!coords.ok) {
      return coords;
    }

    const response = await requestJson(context.session, METEOSOURCE_URL, {
      params: {
        lat: this.formatCoordinate(coords.value.latitude),
        lon: this.formatCoordinate(coords.value.longitude),
        sections: 'current',
        language: 'en',
        units: 'metric',
        key: this.apiKey,
      },
      signal: context.signal,
    });
    if (!response.ok) {
      return response;
    }

    const current = AdapterMapper.asRecord(response.value.current);
    if (!current) {
      return this.missingField('current');
    }

    return ok({
      temperature: AdapterMapper.safeFloat(current.temperature) ?? 0,
      humidity: AdapterMapper.safeFloat(current.humidity),
      condition: AdapterMapper.asString(current.summary),
    });
  }
}
