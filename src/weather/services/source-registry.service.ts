// src/weather/services/source-registry.service.ts

import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { WeatherSourceAdapter } from '../adapters/weather-source.adapter.interface';
import { OpenMeteoAdapter } from '../adapters/open-meteo.adapter';
import { WttrInAdapter } from '../adapters/wttr-in.adapter';
import { WeatherApiAdapter } from '../adapters/weatherapi.adapter';
import { OpenWeatherAdapter } from '../adapters/openweather.adapter';
import { WeatherstackAdapter } from '../adapters/weatherstack.adapter';
import { VisualCrossingAdapter } from '../adapters/visual-crossing.adapter';
import { MeteosourceAdapter } from '../adapters/meteosource.adapter';
import { PirateWeatherAdapter } from '../adapters/pirate-weather.adapter';
import { TomorrowIoAdapter } from '../adapters/tomorrow-io.adapter';
import { GeocodeResolverService } from './geocode-resolver.service';
import { ConditionTaxonomyService } from './condition-taxonomy.service';

/**
 * 数据源名称归一化：忽略大小写和标点（"wttr.in" == "WTTRIN"）
 */
export function normalizeSourceName(name: string): string {
  return name.toLowerCase().replace(/[^a-z0-9]/g, '');
}

/**
 * 解析逗号分隔的排除列表
 */
export function parseExcludeList(exclude: string | undefined): string[] {
  if (!exclude) {
    return [];
  }
  return exclude
    .split(',')
    .map((name) => name.trim())
    .filter((name) => name.length > 0);
}

/**
 * 数据源注册表
 *
 * 免费数据源始终创建；需要 API Key 的数据源只有在配置了 Key 时才创建
 */
@Injectable()
export class SourceRegistryService {
  private readonly logger = new Logger(SourceRegistryService.name);

  constructor(
    private readonly configService: ConfigService,
    private readonly geocoder: GeocodeResolverService,
    private readonly taxonomyService: ConditionTaxonomyService,
  ) {}

  /**
   * 按配置创建全部数据源（顺序即结果顺序）
   */
  createSources(): WeatherSourceAdapter[] {
    const taxonomy = this.taxonomyService.taxonomy;
    const sources: WeatherSourceAdapter[] = [
      new OpenMeteoAdapter(this.geocoder, taxonomy),
      new WttrInAdapter(),
    ];

    const addSource = (envKey: string, create: (apiKey: string) => WeatherSourceAdapter) => {
      const apiKey = this.configService.get<string>(envKey);
      if (apiKey) {
        sources.push(create(apiKey));
      }
    };

    addSource('WEATHER_API_COM_KEY', (key) => new WeatherApiAdapter(key));
    addSource('OPENWEATHER_API_KEY', (key) => new OpenWeatherAdapter(key, this.geocoder));
    addSource('WEATHERSTACK_API_KEY', (key) => new WeatherstackAdapter(key));
    addSource('VISUALCROSSING_API_KEY', (key) => new VisualCrossingAdapter(key));
    addSource('METEOSOURCE_API_KEY', (key) => new MeteosourceAdapter(key, this.geocoder));
    addSource('PIRATE_WEATHER_API_KEY', (key) => new PirateWeatherAdapter(key, this.geocoder));
    addSource('TOMORROW_IO_API_KEY', (key) => new TomorrowIoAdapter(key, this.geocoder, taxonomy));

    this.logger.log(`已启用 ${sources.length} 个数据源: ${sources.map((s) => s.getName()).join(', ')}`);
    return sources;
  }

  /**
   * 移除被排除的数据源
   */
  filterExcluded(sources: WeatherSourceAdapter[], exclude: string | undefined): WeatherSourceAdapter[] {
    const excluded = new Set(parseExcludeList(exclude).map(normalizeSourceName));
    if (excluded.size === 0) {
      return sources;
    }
    return sources.filter((source) => !excluded.has(normalizeSourceName(source.getName())));
  }
}
