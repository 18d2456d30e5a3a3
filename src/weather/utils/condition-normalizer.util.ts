// src/weather/utils/condition-normalizer.util.ts

import {
  ConditionCategory,
  ConditionTaxonomy,
  WeatherCodeRange,
} from '../interfaces/condition-taxonomy.interface';
import { AdapterMapper } from '../../common/utils/adapter-mapper.util';

/** 没有匹配分类时的展示符号 */
export const NO_DATA_GLYPH = '🌡️';

/** 代码无法映射时的状况 */
export const UNKNOWN_CONDITION = 'Unknown';

/**
 * 天气代码配置格式错误
 */
export class WeatherCodesFormatError extends Error {
  constructor(message: string) {
    super(`Invalid weather codes config: ${message}`);
    this.name = 'WeatherCodesFormatError';
  }
}

/**
 * 查找第一个匹配的分类（按优先级顺序）
 */
function findCategory(
  taxonomy: ConditionTaxonomy,
  condition: string,
): ConditionCategory | undefined {
  const lower = condition.toLowerCase();
  return taxonomy.categories.find((category) =>
    category.keywords.some((keyword) => lower.includes(keyword)),
  );
}

/**
 * 把各数据源的天气描述归一化为标准分类
 *
 * 例如 "Sunny" -> "Clear"，"Partly cloudy" -> "Partly Cloudy"。
 * 无法匹配时原样返回（空串仍是空串）
 */
export function normalizeCondition(taxonomy: ConditionTaxonomy, condition: string): string {
  return findCategory(taxonomy, condition)?.canonicalName ?? condition;
}

/**
 * 天气状况 -> 展示符号
 */
export function conditionGlyph(taxonomy: ConditionTaxonomy, condition: string): string {
  return findCategory(taxonomy, condition)?.glyph ?? NO_DATA_GLYPH;
}

/**
 * WMO 天气代码 -> 状况（Open-Meteo 使用）
 */
export function mapWmoCode(taxonomy: ConditionTaxonomy, code: number): string {
  const range = taxonomy.wmoRanges.find((r) => code >= r.min && code <= r.max);
  return range?.condition ?? UNKNOWN_CONDITION;
}

/**
 * Tomorrow.io 天气代码 -> 状况
 */
export function mapTomorrowCode(taxonomy: ConditionTaxonomy, code: number): string {
  return taxonomy.tomorrowCodes[String(code)] || UNKNOWN_CONDITION;
}

/**
 * 校验并冻结 weather-codes.json 的内容
 */
export function parseConditionTaxonomy(raw: unknown): ConditionTaxonomy {
  const root = AdapterMapper.asRecord(raw);
  if (!root) {
    throw new WeatherCodesFormatError('root must be an object');
  }

  const wmo = AdapterMapper.asRecord(root.wmo);
  if (!wmo || !Array.isArray(wmo.ranges)) {
    throw new WeatherCodesFormatError('missing wmo.ranges');
  }
  const wmoRanges: WeatherCodeRange[] = wmo.ranges.map((item, index) => {
    const range = AdapterMapper.asRecord(item);
    const min = range?.min;
    const max = range?.max;
    const condition = range?.condition;
    if (typeof min !== 'number' || typeof max !== 'number' || typeof condition !== 'string') {
      throw new WeatherCodesFormatError(`wmo.ranges[${index}] must have numeric min/max and a condition`);
    }
    return Object.freeze({ min, max, condition });
  });

  const tomorrow = AdapterMapper.asRecord(root.tomorrow_io) ?? {};
  const tomorrowCodes: Record<string, string> = {};
  for (const [code, condition] of Object.entries(tomorrow)) {
    if (typeof condition !== 'string') {
      throw new WeatherCodesFormatError(`tomorrow_io.${code} must be a string`);
    }
    tomorrowCodes[code] = condition;
  }

  if (!Array.isArray(root.conditions) || root.conditions.length === 0) {
    throw new WeatherCodesFormatError('conditions must be a non-empty array');
  }
  const categories: ConditionCategory[] = root.conditions.map((item, index) => {
    const entry = AdapterMapper.asRecord(item);
    const name = entry?.name;
    const keywords = entry?.keywords;
    if (typeof name !== 'string' || !Array.isArray(keywords)) {
      throw new WeatherCodesFormatError(`conditions[${index}] must have a name and keywords`);
    }
    const normalizedKeywords = keywords.map((keyword) => {
      if (typeof keyword !== 'string' || keyword === '') {
        throw new WeatherCodesFormatError(`conditions[${index}].keywords must be non-empty strings`);
      }
      return keyword.toLowerCase();
    });
    return Object.freeze({
      canonicalName: name,
      keywords: Object.freeze(normalizedKeywords),
      glyph: AdapterMapper.asString(entry?.glyph) || NO_DATA_GLYPH,
    });
  });

  return Object.freeze({
    categories: Object.freeze(categories),
    wmoRanges: Object.freeze(wmoRanges),
    tomorrowCodes: Object.freeze(tomorrowCodes),
  });
}
