// src/weather/services/weather.service.ts

import { Injectable, Logger } from '@nestjs/common';
import { FetchMode, WeatherReport } from '../interfaces/weather.interface';
import { NoSourcesError } from '../weather.errors';
import { ConditionTaxonomyService } from './condition-taxonomy.service';
import { FetchOrchestratorService } from './fetch-orchestrator.service';
import { SourceRegistryService } from './source-registry.service';
import { WeatherAggregatorService } from './weather-aggregator.service';

export interface WeatherRequest {
  city: string;
  sequential?: boolean;
  /** 逗号分隔的数据源名称 */
  exclude?: string;
}

/**
 * 天气聚合服务（Controller 和 CLI 的统一入口）
 */
@Injectable()
export class WeatherService {
  private readonly logger = new Logger(WeatherService.name);

  constructor(
    private readonly registry: SourceRegistryService,
    private readonly orchestrator: FetchOrchestratorService,
    private readonly aggregator: WeatherAggregatorService,
    private readonly taxonomyService: ConditionTaxonomyService,
  ) {}

  async getWeather(request: WeatherRequest): Promise<WeatherReport> {
    const sources = this.registry.filterExcluded(this.registry.createSources(), request.exclude);
    if (sources.length === 0) {
      throw new NoSourcesError();
    }

    const mode: FetchMode = request.sequential ? 'sequential' : 'concurrent';
    const start = performance.now();
    const observations = await this.orchestrator.fetch(request.city, sources, mode);
    const totalDurationMs = performance.now() - start;

    const summary = this.aggregator.aggregate(observations);
    this.logger.log(
      `${request.city}: ${mode} 模式完成 ${summary.validCount}/${observations.length} 个数据源, 耗时 ${totalDurationMs.toFixed(0)}ms`
    );

    return {
      city: request.city,
      mode,
      totalDurationMs,
      observations,
      summary,
      consensusGlyph: this.taxonomyService.glyph(summary.consensusCondition),
    };
  }
}
