// src/weather/dto/weather-query.dto.ts

import { IsBoolean, IsNotEmpty, IsOptional, IsString, Matches, MaxLength } from 'class-validator';
import { Transform } from 'class-transformer';
import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';

/** 允许：任意语言字母、数字、空白、各种横线、撇号、句点、下划线（空串交给 IsNotEmpty） */
export const CITY_NAME_PATTERN = /^[\p{L}0-9_\s\p{Pd}'.]*$/u;

/**
 * 天气查询 DTO（HTTP 查询参数和 CLI 参数共用）
 */
export class WeatherQueryDto {
  @ApiProperty({
    description: '城市名（支持 ü、é、ñ 等字母，以及空格、横线、撇号、句点）',
    example: 'New York',
    maxLength: 100,
  })
  @Transform(({ value }) => (typeof value === 'string' ? value.trim() : value))
  @IsString()
  @IsNotEmpty({ message: 'city name is required and cannot be empty' })
  @MaxLength(100, { message: 'city name must not exceed 100 characters' })
  @Matches(/^(?!-)/, { message: "city name cannot start with '-'" })
  @Matches(CITY_NAME_PATTERN, {
    message: 'Invalid city name. Allowed: letters (ü, é, ñ), digits, spaces, hyphens, apostrophes, periods',
  })
  city!: string;

  @ApiPropertyOptional({
    description: '顺序获取（用于与并发模式对比耗时）',
    example: false,
  })
  @IsOptional()
  @Transform(({ value }) => value === true || value === 'true' || value === '1')
  @IsBoolean()
  sequential?: boolean;

  @ApiPropertyOptional({
    description: '要排除的数据源，逗号分隔（忽略大小写和标点）',
    example: 'wttr.in,WeatherAPI.com',
  })
  @IsOptional()
  @IsString()
  exclude?: string;
}
