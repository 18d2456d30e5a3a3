// src/weather/interfaces/condition-taxonomy.interface.ts

/**
 * 天气状况分类条目
 */
export interface ConditionCategory {
  /** 标准分类名（如 'Partly Cloudy'） */
  readonly canonicalName: string;

  /** 匹配关键词（小写，子串匹配） */
  readonly keywords: readonly string[];

  /** 展示符号 */
  readonly glyph: string;
}

/**
 * WMO 天气代码区间
 */
export interface WeatherCodeRange {
  readonly min: number;
  readonly max: number;
  readonly condition: string;
}

/**
 * 天气代码配置（启动时加载一次，之后不可变）
 *
 * categories 的顺序即匹配优先级：更具体的分类必须排在更宽泛的分类之前
 */
export interface ConditionTaxonomy {
  readonly categories: readonly ConditionCategory[];
  readonly wmoRanges: readonly WeatherCodeRange[];
  readonly tomorrowCodes: Readonly<Record<string, string>>;
}
