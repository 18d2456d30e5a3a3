// src/weather/adapters/openweather.adapter.ts

import { AdapterMapper } from '../../common/utils/adapter-mapper.util';
import { SourceResult, ok } from '../interfaces/source-result.interface';
import { GeocodeResolverService } from '../services/geocode-resolver.service';
import { requestJson } from '../utils/http-json.util';
import { BaseWeatherAdapter, FetchContext, WeatherReading } from './base.adapter';

export const OPENWEATHER_URL = 'https://api.openweathermap.org/data/2.5/weather';

/**
 * OpenWeather 适配器（使用 Current Weather API）
 * 
 * 需要 API Key，按坐标查询
 */
export class OpenWeatherAdapter extends BaseWeatherAdapter {
  constructor(apiKey: string, private readonly geocoder: GeocodeResolverService) {
    super(OpenWeatherAdapter.name, apiKey);
  }

  getName(): string {
    return 'OpenWeather';
  }

  requiresApiKey(): boolean {
    return true;
  }

  protected async fetchReading(city: string, context: FetchContext): Promise<SourceResult<WeatherReading>> {
    const coords = await this.geocoder.getCoordinates(city, context.session, context.geocodeCache, context.signal);
    if (!coords.ok) {
      return coords;
    }

    const response = await requestJson(context.session, OPENWEATHER_URL, {
      params: {
        lat: this.formatCoordinate(coords.value.latitude),
        lon: this.formatCoordinate(coords.value.longitude),
        appid: this.apiKey,
        units: 'metric',
      },
      signal: context.signal,
    });
    if (!response.ok) {
      return response;
    }

    const main = AdapterMapper.asRecord(response.value.main);
    if (!main) {
      return this.missingField('main');
    }

    // description 比 main 更细（"light rain" vs "Rain"）
    const weather = AdapterMapper.asRecord(AdapterMapper.firstItem(response.value.weather));
    return ok({
      temperature: AdapterMapper.safeFloat(main.temp) ?? 0,
      humidity: AdapterMapper.safeFloat(main.humidity),
      condition: AdapterMapper.asString(weather?.description) || AdapterMapper.asString(weather?.main),
    });
  }
}
