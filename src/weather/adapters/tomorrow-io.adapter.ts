// src/weather/adapters/tomorrow-io.adapter.ts

import { AdapterMapper } from '../../common/utils/adapter-mapper.util';
import { ConditionTaxonomy } from '../interfaces/condition-taxonomy.interface';
import { SourceResult, ok } from '../interfaces/source-result.interface';
import { GeocodeResolverService } from '../services/geocode-resolver.service';
import { UNKNOWN_CONDITION, mapTomorrowCode } from '../utils/condition-normalizer.util';
import { requestJson } from '../utils/http-json.util';
import { BaseWeatherAdapter, FetchContext, WeatherReading } from './base.adapter';

export const TOMORROW_IO_URL = 'https://api.tomorrow.io/v4/weather/realtime';

/**
 * Tomorrow.io 适配器（Realtime API，需要 API Key，按坐标查询）
 */
export class TomorrowIoAdapter extends BaseWeatherAdapter {
  constructor(
    apiKey: string,
    private readonly geocoder: GeocodeResolverService,
    private readonly taxonomy: ConditionTaxonomy,
  ) {
    super(TomorrowIoAdapter.name, apiKey);
  }

  getName(): string {
    return 'Tomorrow.io';
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
    const response = await requestJson(context.session, TOMORROW_IO_URL, {
      params: { location: `${lat},${lon}`, units: 'metric', apikey: this.apiKey },
      signal: context.signal,
    });
    if (!response.ok) {
      return response;
    }

    const values = AdapterMapper.asRecord(AdapterMapper.asRecord(response.value.data)?.values);
    if (!values) {
      return this.missingField('data.values');
    }

    const code = AdapterMapper.safeFloat(values.weatherCode);
    return ok({
      temperature: AdapterMapper.safeFloat(values.temperature) ?? 0,
      humidity: AdapterMapper.safeFloat(values.humidity),
      condition: code === null ? UNKNOWN_CONDITION : mapTomorrowCode(this.taxonomy, code),
    });
  }
}
