// src/weather/interfaces/source-result.interface.ts

/**
 * 网络请求失败类型
 */
export type RequestFailure =
  | { kind: 'timeout' }
  | { kind: 'http'; status: number }
  | { kind: 'network'; detail?: string }
  | { kind: 'invalid-json' };

/**
 * 数据源失败类型（包含请求失败）
 */
export type SourceFailure =
  | RequestFailure
  | { kind: 'missing-credential' }
  | { kind: 'city-not-found' }
  | { kind: 'geocoding'; cause: RequestFailure }
  | { kind: 'parsing'; detail: string };

/**
 * 每一步网络/解析操作的返回值
 */
export type SourceResult<T, E = SourceFailure> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function fail<E>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}

/**
 * 失败类型 -> Observation.error 字符串
 */
export function describeFailure(failure: SourceFailure): string {
  switch (failure.kind) {
    case 'timeout':
      return 'timeout';
    case 'http':
      return `HTTP ${failure.status}`;
    case 'network':
      return failure.detail ? `network error: ${failure.detail}` : 'network error';
    case 'invalid-json':
      return 'invalid JSON';
    case 'missing-credential':
      return 'API key required';
    case 'city-not-found':
      return 'city not found';
    case 'geocoding':
      return `geocoding request failed: ${describeFailure(failure.cause)}`;
    case 'parsing':
      return `data parsing error: ${failure.detail}`;
  }
}
