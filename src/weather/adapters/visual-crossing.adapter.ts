// src/weather/adapters/visual-crossing.adapter.ts

import { AdapterMapper } from '../../common/utils/adapter-mapper.util';
import { SourceResult, ok } from '../interfaces/source-result.interface';
import { requestJson } from '../utils/http-json.util';
import { BaseWeatherAdapter, FetchContext, WeatherReading } from './base.adapter';

export const VISUAL_CROSSING_URL =
  'https://weather.visualcrossing.com/VisualCrossingWebServices/rest/services/timeline';

/**
 * Visual Crossing 适配器（Timeline API，需要 API Key，按城市名查询）
 */
export class VisualCrossingAdapter extends BaseWeatherAdapter {
  constructor(apiKey: string) {
    super(VisualCrossingAdapter.name, apiKey);
  }

  getName(): string {
    return 'Visual Crossing';
  }

  requiresApiKey(): boolean {
    return true;
  }

  protected async fetchReading(city: string, context: FetchContext): Promise<SourceResult<WeatherReading>> {
    const url = `${VISUAL_CROSSING_URL}/${encodeURIComponent(city)}/today`;
    const response = await requestJson(context.session, url, {
      params: {
        unitGroup: 'metric',
        include: 'current',
        contentType: 'json',
        key: this.apiKey,
      },
      signal: context.signal,
    });
    if (!response.ok) {
      return response;
    }

    const current = AdapterMapper.asRecord(response.value.currentConditions);
    if (!current) {
      return this.missingField('currentConditions');
    }

    return ok({
      temperature: AdapterMapper.safeFloat(current.temp) ?? 0,
      humidity: AdapterMapper.safeFloat(current.humidity),
      condition: AdapterMapper.asString(current.conditions),
    });
  }
}
