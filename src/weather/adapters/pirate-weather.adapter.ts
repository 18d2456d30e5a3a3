// src/weather/adapters/pirate-weather.adapter.ts

import { AdapterMapper } from '../../common/utils/adapter-mapper.util';
import { SourceResult, ok } from '../interfaces/source-result.interface';
import { GeocodeResolverService } from '../services/geocode-resolver.service';
import { requestJson } from '../utils/http-json.util';
import { BaseWeatherAdapter, FetchContext, WeatherReading } from './base.adapter';

export const PIRATE_WEATHER_URL = 'https://api.pirateweather.net/forecast';

/**
 * Pirate Weather 适配器（兼容 Dark Sky 格式，需要 API Key，按坐标查询）
 */
export class PirateWeatherAdapter extends BaseWeatherAdapter {
  constructor(apiKey: string, private readonly geocoder: GeocodeResolverService) {
    super(PirateWeatherAdapter.name, apiKey);
  }

  getName(): string {
    return 'Pirate Weather';
  }

  requiresApiKey(): boolean {
    return true;
  }

  protected async fetchReading(city: string, context: FetchContext): Promise<SourceResult<WeatherReading>> {
    const coords = await this.geocoder.getCoordinates(city, context.session, context.geocodeCache, context.signal);
    if (!coords.ok) {
      return coords;
    }

    const lat = this.formatCoordinate(coords.value.latitude);
    const lon = this.formatCoordinate(coords.value.longitude);
    const url = `${PIRATE_WEATHER_URL}/${encodeURIComponent(this.apiKey)}/${lat},${lon}`;
    const response = await requestJson(context.session, url, {
      params: { units: 'si' },
      signal: context.signal,
    });
    if (!response.ok) {
      return response;
    }

    const currently = AdapterMapper.asRecord(response.value.currently);
    if (!currently) {
      return this.missingField('currently');
    }

    // 湿度是 0-1 的比例
    const humidity = AdapterMapper.safeFloat(currently.humidity);
    return ok({
      temperature: AdapterMapper.safeFloat(currently.temperature) ?? 0,
      humidity: humidity === null ? null : humidity * 100,
      condition: AdapterMapper.asString(currently.summary),
    });
  }
}
