import { applyDecorators } from '@nestjs/common';
import { ApiExtraModels, ApiResponse, getSchemaPath } from '@nestjs/swagger';
import { ERROR_RESPONSES, ErrorResponseDto } from '../dto/error-response.dto';

export type ErrorResponseKey = keyof typeof ERROR_RESPONSES;

const RECORD_ERRORS: ErrorResponseKey[] = ['BAD_REQUEST', 'NOT_FOUND'];

/**
 * Documents the error bodies a controller can return. Without keys, the
 * validation and not-found responses every record controller shares.
 */
export function ApiErrorResponses(...keys: ErrorResponseKey[]) {
  const documented = keys.length > 0 ? keys : RECORD_ERRORS;

  return applyDecorators(
    ApiExtraModels(ErrorResponseDto),
    ...documented.map((key) => {
      const { status, description, example } = ERROR_RESPONSES[key];
      return ApiResponse({
        status,
        description,
        content: { 'application/json': { schema: { $ref: getSchemaPath(ErrorResponseDto) }, example } },
      });
    }),
  );
}
