// src/weather/adapters/weatherapi.adapter.ts

import { AdapterMapper } from '../../common/utils/adapter-mapper.util';
import { SourceResult, ok } from '../interfaces/source-result.interface';
import { requestJson } from '../utils/http-json.util';
import { BaseWeatherAdapter, FetchContext, WeatherReading } from './base.adapter';

export const WEATHERAPI_URL = 'https://api.weatherapi.com/v1/current.json';

/**
 * WeatherAPI.com 适配器（需要 API Key，按城市名查询）
 */
export class WeatherApiAdapter extends BaseWeatherAdapter {
  constructor(apiKey: string) {
    super(WeatherApiAdapter.name, apiKey);
  }

  getName(): string {
    return 'WeatherAPI.com';
  }

  requiresApiKey(): boolean {
    return true;
  }

  protected async fetchReading(city: string, context: FetchContext): Promise<SourceResult<WeatherReading>> {
    const response = await requestJson(context.session, WEATHERAPI_URL, {
      params: { key: this.apiKey, q: city },
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
      temperature: AdapterMapper.safeFloat(current.temp_c) ?? 0,
      humidity: AdapterMapper.safeFloat(current.humidity),
      condition: AdapterMapper.asString(AdapterMapper.asRecord(current.condition)?.text),
    });
  }
}
