// src/weather/adapters/open-meteo.adapter.ts

import { AdapterMapper } from '../../common/utils/adapter-mapper.util';
import { ConditionTaxonomy } from '../interfaces/condition-taxonomy.interface';
import { SourceResult, ok } from '../interfaces/source-result.interface';
import { GeocodeResolverService } from '../services/geocode-resolver.service';
import { UNKNOWN_CONDITION, mapWmoCode } from '../utils/condition-normalizer.util';
import { requestJson } from '../utils/http-json.util';
import { BaseWeatherAdapter, FetchContext, WeatherReading } from './base.adapter';

export const OPEN_METEO_URL = 'https://api.open-meteo.com/v1/forecast';

/**
 * Open-Meteo 适配器
 * 
 * 免费，无需 API Key；按坐标查询，天气状况为 WMO 代码
 */
export class OpenMeteoAdapter extends BaseWeatherAdapter {
  constructor(
    private readonly geocoder: GeocodeResolverService,
    private readonly taxonomy: ConditionTaxonomy,
  ) {
    super(OpenMeteoAdapter.name);
  }

  getName(): string {
    return 'Open-Meteo';
  }

  protected async fetchReading(city: string, context: FetchContext): Promise<SourceResult<WeatherReading>> {
    const coords = await this.geocoder.getCoordinates(city, context.session, context.geocodeCache, context.signal);
    if (!coords.ok) {
      return coords;
    }

    const response = await requestJson(context.session, OPEN_METEO_URL, {
      params: {
        latitude: this.formatCoordinate(coords.value.latitude),
        longitude: this.formatCoordinate(coords.value.longitude),
        current: 'temperature_2m,relative_humidity_2m,weather_code',
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

    const code = AdapterMapper.safeFloat(current.weather_code);
    return ok({
      temperature: AdapterMapper.safeFloat(current.temperature_2m) ?? 0,
      humidity: AdapterMapper.safeFloat(current.relative_humidity_2m),
      condition: code === null ? UNKNOWN_CONDITION : mapWmoCode(this.taxonomy, code),
    });
  }
}
