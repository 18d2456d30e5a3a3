// src/weather/weather.module.ts

import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { HttpClientFactory, DEFAULT_REQUEST_TIMEOUT_MS } from '../common/utils/http-client.factory';
import { WeatherController } from './weather.controller';
import { WeatherService } from './services/weather.service';
import { ConditionTaxonomyService } from './services/condition-taxonomy.service';
import { GeocodeResolverService } from './services/geocode-resolver.service';
import { SourceRegistryService } from './services/source-registry.service';
import { WeatherAggregatorService } from './services/weather-aggregator.service';
import {
  FetchOrchestratorService,
  WEATHER_HTTP_CLIENT,
  readPositiveInt,
} from './services/fetch-orchestrator.service';

/**
 * 天气聚合模块
 * 
 * 数据源适配器 + 获取编排 + 聚合
 */
@Module({
  imports: [ConfigModule],
  controllers: [WeatherController],
  providers: [
    // 所有数据源共享的 HTTP 客户端
    {
      provide: WEATHER_HTTP_CLIENT,
      useFactory: (configService: ConfigService) =>
        HttpClientFactory.create({
          timeout: readPositiveInt(configService, 'WEATHER_REQUEST_TIMEOUT_MS', DEFAULT_REQUEST_TIMEOUT_MS),
        }),
      inject: [ConfigService],
    },
    ConditionTaxonomyService,
    GeocodeResolverService,
    SourceRegistryService,
    FetchOrchestratorService,
    WeatherAggregatorService,
    WeatherService,
  ],
  exports: [WeatherService, ConditionTaxonomyService],
})
export class WeatherModule {}
