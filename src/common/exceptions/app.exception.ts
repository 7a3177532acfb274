import { HttpException, HttpStatus } from '@nestjs/common';

export interface ErrorDetail {
  field: string;
  message: string;
}

/**
 * Base class for errors that carry a stable error code in the response body.
 * Plain Nest HttpExceptions still work; the filter derives their code from the status.
 */
export class AppException extends HttpException {
  constructor(
    readonly code: string,
    message: string,
    status: number,
    readonly details?: ErrorDetail[],
  ) {
    super(message, status);
  }
}

export class AuthenticationException extends AppException {
  constructor(message = '인증이 필요합니다.') {
    super('AUTHENTICATION_ERROR', message, HttpStatus.UNAUTHORIZED);
  }
}

export class AuthorizationException extends AppException {
  constructor(message = '접근 권한이 없습니다.') {
    super('AUTHORIZATION_ERROR', message, HttpStatus.FORBIDDEN);
  }
}

export class ValidationException extends AppException {
  constructor(details: ErrorDetail[], message = '입력 데이터 검증에 실패했습니다.') {
    super('VALIDATION_ERROR', message, HttpStatus.UNPROCESSABLE_ENTITY, details);
  }
}

export class ResourceNotFoundException extends AppException {
  constructor(message = '리소스를 찾을 수 없습니다.') {
    super('NOT_FOUND', message, HttpStatus.NOT_FOUND);
  }
}

// Upstream provider failure; status is what the client sees, not the provider's.
export class ExternalApiException extends AppException {
  constructor(
    message: string,
    status: number = HttpStatus.BAD_GATEWAY,
    readonly provider?: string,
  ) {
    super('EXTERNAL_API_ERROR', message, status);
  }
}
