// src/weather/dto/weather-report.dto.ts

import { ApiProperty } from '@nestjs/swagger';

/**
 * 单个数据源观测 DTO（用于 Swagger 文档）
 */
export class ObservationDto {
  @ApiProperty({ example: 'Open-Meteo' })
  source!: string;

  @ApiProperty({ description: '温度（摄氏度）', example: 12.4 })
  temperature!: number;

  @ApiProperty({ description: '相对湿度（%），未提供时为 null', example: 81, nullable: true, type: Number })
  humidity!: number | null;

  @ApiProperty({ example: 'Partly Cloudy' })
  condition!: string;

  @ApiProperty({
    description: '错误信息：timeout / HTTP <status> / network error / invalid JSON / city not found / API key required / data parsing error: ... / geocoding request failed: ...',
    example: null,
    nullable: true,
    type: String,
  })
  error!: string | null;

  @ApiProperty({ description: '调用耗时（毫秒）', example: 183.2, nullable: true, type: Number })
  durationMs!: number | null;
}

/**
 * 聚合结果 DTO
 */
export class AggregateSummaryDto {
  @ApiProperty({ example: 12.1 })
  avgTemperature!: number;

  @ApiProperty({ example: 78.5 })
  avgHumidity!: number;

  @ApiProperty({ example: 2 })
  humiditySampleCount!: number;

  @ApiProperty({ description: '共识状况，或 No data / No valid data / Unknown', example: 'Partly Cloudy' })
  consensusCondition!: string;

  @ApiProperty({ example: 2 })
  validCount!: number;
}

/**
 * 查询报告 DTO
 */
export class WeatherReportDto {
  @ApiProperty({ example: 'Munich' })
  city!: string;

  @ApiProperty({ enum: ['concurrent', 'sequential'], example: 'concurrent' })
  mode!: 'concurrent' | 'sequential';

  @ApiProperty({ example: 412.7 })
  totalDurationMs!: number;

  @ApiProperty({ type: [ObservationDto] })
  observations!: ObservationDto[];

  @ApiProperty({ type: AggregateSummaryDto })
  summary!: AggregateSummaryDto;

  @ApiProperty({ example: '⛅' })
  consensusGlyph!: string;
}
