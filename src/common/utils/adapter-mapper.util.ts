// src/common/utils/adapter-mapper.util.ts

import axios from 'axios';
import { RequestFailure } from '../../weather/interfaces/source-result.interface';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * 适配器映射工具
 * 
 * 统一处理各种数据源的字段映射，减少重复代码
 */
export class AdapterMapper {
  /**
   * 宽松的数值转换
   *
   * 有限数字原样返回；数字字符串（允许末尾 %）解析为数字；其他一律返回 null
   */
  static safeFloat(value: unknown): number | null {
    if (typeof value === 'number') {
      return Number.isFinite(value) ? value : null;
    }
    if (typeof value === 'string') {
      const trimmed = value.trim().replace(/%$/, '').trim();
      if (trimmed === '') {
        return null;
      }
      const parsed = Number(trimmed);
      return Number.isFinite(parsed) ? parsed : null;
    }
    return null;
  }

  /**
   * 取对象字段，非对象返回 null
   */
  static asRecord(value: unknown): Record<string, unknown> | null {
    return isRecord(value) ? value : null;
  }

  /**
   * 取字符串，非字符串返回空串
   */
  static asString(value: unknown): string {
    return typeof value === 'string' ? value : '';
  }

  /**
   * 取数组第一个元素
   */
  static firstItem(value: unknown): unknown {
    return Array.isArray(value) && value.length > 0 ? value[0] : undefined;
  }

  /**
   * 安全地提取错误消息
   */
  static extractErrorMessage(error: unknown): string {
    if (error instanceof Error) {
      return error.message;
    }
    if (typeof error === 'string') {
      return error;
    }
    return String(error);
  }

  /**
   * 把 axios 抛出的异常归类为请求失败类型
   *
   * 取消（AbortController 截止时间到达）和 axios 自身超时都视为 timeout
   */
  static toRequestFailure(error: unknown): RequestFailure {
    if (axios.isCancel(error)) {
      return { kind: 'timeout' };
    }
    if (axios.isAxiosError(error)) {
      if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
        return { kind: 'timeout' };
      }
      if (error.response) {
        return { kind: 'http', status: error.response.status };
      }
      return { kind: 'network', detail: error.message || undefined };
    }
    const detail = this.extractErrorMessage(error);
    return { kind: 'network', detail: detail || undefined };
  }
}
