// src/weather/utils/report-formatter.util.ts

import { Observation, WeatherReport } from '../interfaces/weather.interface';

const SOURCE_COLUMN_WIDTH = 18;

/**
 * 单个数据源的结果行
 */
export function formatObservation(observation: Observation): string {
  const label = `${observation.source}:`.padEnd(SOURCE_COLUMN_WIDTH);
  const duration = `(${(observation.durationMs ?? 0).toFixed(0)}ms)`;

  if (observation.error !== null) {
    return `❌ ${label} ERROR: ${observation.error} ${duration}`;
  }

  const humidity = observation.humidity === null ? 'N/A' : `${observation.humidity.toFixed(0)}%`;
  return `✅ ${label} ${observation.temperature.toFixed(1)}°C, ${humidity} humidity, ${observation.condition} ${duration}`;
}

/**
 * 完整报告（CLI 输出）
 */
export function formatReport(report: WeatherReport): string[] {
  const { summary, observations } = report;
  const lines = [
    `🌍 ${report.city} | ${observations.length} sources (${report.mode})`,
    `⏱️  Completed in ${(report.totalDurationMs / 1000).toFixed(3)}s`,
    '',
    ...observations.map(formatObservation),
    '',
    `📊 Aggregated (${summary.validCount}/${observations.length} valid):`,
  ];

  if (summary.validCount === 0) {
    lines.push('→ No valid data available');
    return lines;
  }

  lines.push(`→ Avg Temperature: ${summary.avgTemperature.toFixed(2)}°C`);
  lines.push(
    summary.humiditySampleCount > 0
      ? `→ Avg Humidity:    ${summary.avgHumidity.toFixed(1)}% (${summary.humiditySampleCount} sources)`
      : '→ Avg Humidity:    N/A'
  );
  lines.push(`→ Consensus:       ${summary.consensusCondition} ${report.consensusGlyph}`);
  return lines;
}
