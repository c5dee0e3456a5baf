import { HttpStatus } from '@nestjs/common';
import { ApiProperty } from '@nestjs/swagger';

/**
 * Error body rendered by the global exception filter
 */
export class ErrorResponseDto {
  @ApiProperty({
    description: 'HTTP status code',
    example: 400,
    enum: [
      HttpStatus.BAD_REQUEST,
      HttpStatus.NOT_FOUND,
      HttpStatus.CONFLICT,
      HttpStatus.INTERNAL_SERVER_ERROR,
    ],
  })
  statusCode!: number;

  @ApiProperty({
    description: 'Error message or array of validation errors',
    oneOf: [{ type: 'string' }, { type: 'array', items: { type: 'string' } }],
    example: 'Validation failed',
  })
  message!: string | string[];

  @ApiProperty({ description: 'Error type or domain error code', example: 'record.not_found' })
  error!: string;

  @ApiProperty({ description: 'API path where the error occurred', example: '/api/v1/assets/42' })
  path!: string;

  @ApiProperty({ description: 'ISO timestamp of when the error occurred', example: '2026-02-03T10:30:00.000Z' })
  timestamp!: string;
}

/**
 * Common error response examples for Swagger documentation
 */
export const ERROR_RESPONSES = {
  BAD_REQUEST: {
    status: 400,
    description: 'Bad Request - Validation failed',
    example: {
      statusCode: 400,
      message: ['assetModelId must be an integer number'],
      error: 'Bad Request',
      path: '/api/v1/assets',
      timestamp: '2026-02-03T10:30:00.000Z',
    },
  },
  NOT_FOUND: {
    status: 404,
    description: 'Not Found - Resource does not exist',
    example: {
      statusCode: 404,
      message: 'Asset with ID 42 not found',
      error: 'record.not_found',
      path: '/api/v1/assets/42',
      timestamp: '2026-02-03T10:30:00.000Z',
    },
  },
  CONFLICT: {
    status: 409,
    description: 'Conflict - A unique value is already taken',
    example: {
      statusCode: 409,
      message: 'A record with the same unique value already exists',
      error: 'record.duplicate',
      path: '/api/v1/companies',
      timestamp: '2026-02-03T10:30:00.000Z',
    },
  },
  INTERNAL_SERVER_ERROR: {
    status: 500,
    description: 'Internal Server Error',
    example: {
      statusCode: 500,
      message: 'Internal server error',
      error: 'Internal Server Error',
      path: '/api/v1/assets',
      timestamp: '2026-02-03T10:30:00.000Z',
    },
  },
};
