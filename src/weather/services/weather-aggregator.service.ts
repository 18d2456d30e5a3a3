// src/weather/services/weather-aggregator.service.ts

import { Injectable } from '@nestjs/common';
import { AggregateSummary, Observation } from '../interfaces/weather.interface';
import { ConditionTaxonomyService } from './condition-taxonomy.service';

/**
 * 聚合观测数据
 *
 * - 温度：所有有效观测的平均值
 * - 湿度：只统计提供了湿度的有效观测，null 表示未采样而不是 0
 * - 共识：归一化后出现次数最多的分类；次数相同时取最先出现的分类
 */
export function aggregateObservations(
  observations: readonly Observation[],
  normalize: (condition: string) => string,
): AggregateSummary {
  if (observations.length === 0) {
    return emptySummary('No data');
  }

  const valid = observations.filter((o) => o.error === null);
  if (valid.length === 0) {
    return emptySummary('No valid data');
  }

  const avgTemperature = valid.reduce((sum, o) => sum + o.temperature, 0) / valid.length;

  const humidities = valid
    .map((o) => o.humidity)
    .filter((h): h is number => h !== null);
  const avgHumidity = humidities.length > 0
    ? humidities.reduce((sum, h) => sum + h, 0) / humidities.length
    : 0;

  // Map 保留插入顺序，严格大于才替换，所以平局时先出现的分类胜出
  const tally = new Map<string, number>();
  for (const o of valid) {
    const normalized = normalize(o.condition);
    if (normalized) {
      tally.set(normalized, (tally.get(normalized) ?? 0) + 1);
    }
  }

  let consensusCondition = 'Unknown';
  let maxCount = 0;
  for (const [condition, count] of tally) {
    if (count > maxCount) {
      maxCount = count;
      consensusCondition = condition;
    }
  }

  return {
    avgTemperature,
    avgHumidity,
    humiditySampleCount: humidities.length,
    consensusCondition,
    validCount: valid.length,
  };
}

function emptySummary(consensusCondition: string): AggregateSummary {
  return {
    avgTemperature: 0,
    avgHumidity: 0,
    humiditySampleCount: 0,
    consensusCondition,
    validCount: 0,
  };
}

@Injectable()
export class WeatherAggregatorService {
  constructor(private readonly taxonomyService: ConditionTaxonomyService) {}

  aggregate(observations: readonly Observation[]): AggregateSummary {
    return aggregateObservations(observations, (condition) => this.taxonomyService.normalize(condition));
  }
}
