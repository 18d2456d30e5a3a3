// src/common/dto/standard-response.dto.ts

/**
 * 统一响应格式
 * 
 * 所有接口必须遵循此格式，确保前端处理一致性
 */
export interface StandardResponse<T = unknown> {
  success: boolean;
  data?: T;
  error?: ErrorResponse;
}

/**
 * 错误响应格式
 */
export interface ErrorResponse {
  code: string;
  message: string;
}

/**
 * 成功响应辅助函数
 */
export function successResponse<T>(data: T): StandardResponse<T> {
  return {
    success: true,
    data,
  };
}

/**
 * 错误响应辅助函数
 */
export function errorResponse(code: string, message: string): StandardResponse {
  return {
    success: false,
    error: {
      code,
      message,
    },
  };
}

/**
 * 错误码常量
 */
export enum ErrorCode {
  // 验证错误（参数不合法、数据源全部被排除）
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  
  // 数据源以外的意外错误
  INTERNAL_ERROR = 'INTERNAL_ERROR',
}
