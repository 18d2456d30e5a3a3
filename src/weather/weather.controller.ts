// src/weather/weather.controller.ts
import { Controller, Get, Query } from '@nestjs/common';
import { ApiTags, ApiOperation, ApiResponse } from '@nestjs/swagger';
import { WeatherService } from './services/weather.service';
import { WeatherQueryDto } from './dto/weather-query.dto';
import { WeatherReportDto } from './dto/weather-report.dto';
import { NoSourcesError } from './weather.errors';
import { successResponse, errorResponse, ErrorCode } from '../common/dto/standard-response.dto';
import { ApiErrorResponseDto } from '../common/dto/api-response.dto';
import { AdapterMapper } from '../common/utils/adapter-mapper.util';

@ApiTags('weather')
@Controller('weather')
export class WeatherController {
  constructor(private readonly weatherService: WeatherService) {}

  @Get()
  @ApiOperation({
    summary: '多数据源天气聚合',
    description:
      '同时查询所有已配置的数据源，返回每个数据源的结果和聚合结果：\n' +
      '- 免费数据源（Open-Meteo、wttr.in）始终启用\n' +
      '- 其他数据源需要在环境变量中配置 API Key\n' +
      '- 单个数据源失败不影响其他数据源，失败信息写在 error 字段\n' +
      '- 湿度只在提供了湿度的数据源之间平均',
  })
  @ApiResponse({
    status: 200,
    description: '成功返回查询报告（统一响应格式）',
    type: WeatherReportDto,
  })
  @ApiResponse({
    status: 200,
    description: '所有数据源都被排除（VALIDATION_ERROR）或意外错误（INTERNAL_ERROR）',
    type: ApiErrorResponseDto,
  })
  async getWeather(@Query() query: WeatherQueryDto) {
    try {
      const report = await this.weatherService.getWeather(query);
      return successResponse(report);
    } catch (error) {
      if (error instanceof NoSourcesError) {
        return errorResponse(ErrorCode.VALIDATION_ERROR, error.message);
      }
      return errorResponse(ErrorCode.INTERNAL_ERROR, AdapterMapper.extractErrorMessage(error));
    }
  }
}
