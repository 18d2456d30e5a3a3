// src/common/dto/api-response.dto.ts

import { ApiProperty } from '@nestjs/swagger';

/**
 * 错误信息 DTO（用于 Swagger 文档）
 */
export class ApiErrorDto {
  @ApiProperty({
    enum: ['VALIDATION_ERROR', 'INTERNAL_ERROR'],
    example: 'VALIDATION_ERROR',
  })
  code!: string;

  @ApiProperty({ example: 'All sources were excluded' })
  message!: string;
}

/**
 * 错误响应 DTO（用于 Swagger 文档）
 */
export class ApiErrorResponseDto {
  @ApiProperty({ enum: [false], example: false })
  success!: false;

  @ApiProperty({ type: ApiErrorDto })
  error!: ApiErrorDto;
}
