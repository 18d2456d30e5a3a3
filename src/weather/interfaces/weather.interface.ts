// src/weather/interfaces/weather.interface.ts

/**
 * 单个数据源的天气观测（统一格式）
 *
 * 所有数据源适配器都必须把各自的响应转换为这个格式。
 * error 不为 null 时，该条记录不参与聚合计算。
 */
export interface Observation {
  /** 数据源名称（如 'Open-Meteo', 'wttr.in'） */
  source: string;

  /** 温度（摄氏度），缺失时为 0 */
  temperature: number;

  /** 相对湿度（0-100），数据源未提供时为 null，表示"未采样"而不是 0 */
  humidity: number | null;

  /** 数据源原始天气描述 */
  condition: string;

  /** 错误信息，成功时为 null */
  error: string | null;

  /** 本次调用耗时（毫秒），由编排器统一填写 */
  durationMs: number | null;
}

/**
 * 地理坐标
 */
export interface Coordinate {
  latitude: number;
  longitude: number;
}

/**
 * 地理编码缓存：城市名 -> 坐标
 *
 * 每批次只在分发前写入一次，分发期间只读
 */
export type GeocodeCache = ReadonlyMap<string, Coordinate>;

/**
 * 获取模式
 */
export type FetchMode = 'concurrent' | 'sequential';

/**
 * 聚合结果
 */
export interface AggregateSummary {
  /** 平均温度（所有有效观测） */
  avgTemperature: number;

  /** 平均湿度（仅统计提供了湿度的有效观测） */
  avgHumidity: number;

  /** 参与湿度平均的样本数 */
  humiditySampleCount: number;

  /** 共识天气状况（标准分类） */
  consensusCondition: string;

  /** 有效观测数 */
  validCount: number;
}

/**
 * 一次完整查询的报告
 */
export interface WeatherReport {
  city: string;
  mode: FetchMode;
  /** 整批耗时（毫秒） */
  totalDurationMs: number;
  observations: Observation[];
  summary: AggregateSummary;
  /** 共识状况对应的展示符号 */
  consensusGlyph: string;
}
