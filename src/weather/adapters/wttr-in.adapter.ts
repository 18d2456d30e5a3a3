// src/weather/adapters/wttr-in.adapter.ts

import { AdapterMapper } from '../../common/utils/adapter-mapper.util';
import { SourceResult, ok } from '../interfaces/source-result.interface';
import { requestJson } from '../utils/http-json.util';
import { BaseWeatherAdapter, FetchContext, WeatherReading } from './base.adapter';

/**
 * wttr.in 适配器（免费，按城市名查询）
 *
 * 数值字段全部是字符串，例如 { temp_C: "12", humidity: "81" }
 */
export class WttrInAdapter extends BaseWeatherAdapter {
  constructor() {
    super(WttrInAdapter.name);
  }

  getName(): string {
    return 'wttr.in';
  }

  protected async fetchReading(city: string, context: FetchContext): Promise<SourceResult<WeatherReading>> {
    const response = await requestJson(context.session, `https://wttr.in/${encodeURIComponent(city)}`, {
      params: { format: 'j1' },
      signal: context.signal,
    });
    if (!response.ok) {
      return response;
    }

    const current = AdapterMapper.asRecord(AdapterMapper.firstItem(response.value.current_condition));
    if (!current) {
      return this.missingField('current_condition');
    }

    const description = AdapterMapper.asRecord(AdapterMapper.firstItem(current.weatherDesc));
    return ok({
      temperature: AdapterMapper.safeFloat(current.temp_C) ?? 0,
      humidity: AdapterMapper.safeFloat(current.humidity),
      condition: AdapterMapper.asString(description?.value),
    });
  }
}
