// src/weather/adapters/weatherstack.adapter.ts

import { AdapterMapper } from '../../common/utils/adapter-mapper.util';
import { SourceFailure, SourceResult, fail, ok } from '../interfaces/source-result.interface';
import { requestJson } from '../utils/http-json.util';
import { BaseWeatherAdapter, FetchContext, WeatherReading } from './base.adapter';

/** 免费版只支持 HTTP */
export const WEATHERSTACK_URL = 'http://api.weatherstack.com/current';

/**
 * Weatherstack 适配器（需要 API Key，按城市名查询）
 */
export class WeatherstackAdapter extends BaseWeatherAdapter {
  constructor(apiKey: string) {
    super(WeatherstackAdapter.name, apiKey);
  }

  getName(): string {
    return 'Weatherstack';
  }

  requiresApiKey(): boolean {
    return true;
  }

  protected async fetchReading(city: string, context: FetchContext): Promise<SourceResult<WeatherReading>> {
    const response = await requestJson(context.session, WEATHERSTACK_URL, {
      params: { access_key: this.apiKey, query: city },
      signal: context.signal,
    });
    if (!response.ok) {
      return response;
    }

    // Weatherstack 的业务错误也返回 200：{ success: false, error: { info } }
    if (response.value.success === false) {
      const info = AdapterMapper.asString(AdapterMapper.asRecord(response.value.error)?.info);
      return fail<SourceFailure>({ kind: 'parsing', detail: info || 'provider returned an error' });
    }

    const current = AdapterMapper.asRecord(response.value.current);
    if (!current) {
      return this.missingField('current');
    }

    return ok({
      temperature: AdapterMapper.safeFloat(current.temperature) ?? 0,
      humidity: AdapterMapper.safeFloat(current.humidity),
      condition: AdapterMapper.asString(AdapterMapper.firstItem(current.weather_descriptions)),
    });
  }
}
