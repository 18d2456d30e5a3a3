// src/weather/weather.errors.ts

/**
 * 排除过滤后没有可用数据源（配置错误，不是获取结果）
 */
export class NoSourcesError extends Error {
  constructor(message = 'All sources were excluded') {
    super(message);
    this.name = 'NoSourcesError';
  }
}
