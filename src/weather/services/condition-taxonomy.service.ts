// src/weather/services/condition-taxonomy.service.ts

import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { readFileSync } from 'fs';
import * as path from 'path';
import { ConditionTaxonomy } from '../interfaces/condition-taxonomy.interface';
import {
  conditionGlyph,
  normalizeCondition,
  parseConditionTaxonomy,
} from '../utils/condition-normalizer.util';

/**
 * 天气状况分类服务
 *
 * 启动时从 config/weather-codes.json 加载一次，之后只读。
 * 路径可以通过 WEATHER_CODES_PATH 覆盖
 */
@Injectable()
export class ConditionTaxonomyService {
  private readonly logger = new Logger(ConditionTaxonomyService.name);
  readonly taxonomy: ConditionTaxonomy;

  constructor(private readonly configService: ConfigService) {
    const filePath =
      this.configService.get<string>('WEATHER_CODES_PATH') ||
      path.join(process.cwd(), 'config', 'weather-codes.json');

    const content = readFileSync(filePath, 'utf-8');
    this.taxonomy = parseConditionTaxonomy(JSON.parse(content));
    this.logger.log(
      `已加载天气代码配置: ${this.taxonomy.categories.length} 个分类, ${this.taxonomy.wmoRanges.length} 个 WMO 区间`
    );
  }

  normalize(condition: string): string {
    return normalizeCondition(this.taxonomy, condition);
  }

  glyph(condition: string): string {
    return conditionGlyph(this.taxonomy, condition);
  }
}
