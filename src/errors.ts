/**
 * 스트림 클라이언트 에러 분류
 *
 * ConfigurationError — 요청/환경 검증 실패. 네트워크 I/O 전에 동기적으로 throw
 * TransportError     — 바이트 스트림 연결/유지 실패 (HttpError 포함)
 * FrameDecodeError   — JSON 파싱 실패 또는 판별자에 맞는 형태가 아님
 *
 * 알 수 없는 type, 스트림 종료(EOF), 취소는 에러가 아니다.
 */

export class ConfigurationError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ConfigurationError';
  }
}

export class TransportError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'TransportError';
  }
}

export class HttpError extends TransportError {
  readonly statusCode: number;
  /** 서버 응답의 errorMessage (없으면 본문 원문) */
  readonly errorMessage: string;

  constructor(statusCode: number, label: string, errorMessage: string) {
    super(`${statusCode} ${label}: ${errorMessage}`);
    this.name = 'HttpError';
    this.statusCode = statusCode;
    this.errorMessage = errorMessage;
  }
}

export class BadRequestError extends HttpError {
  constructor(errorMessage: string) {
    super(400, 'bad request', errorMessage);
    this.name = 'BadRequestError';
  }
}

export class UnauthorizedError extends HttpError {
  constructor(errorMessage: string) {
    super(401, 'unauthorized', errorMessage);
    this.name = 'UnauthorizedError';
  }
}

export class ForbiddenError extends HttpError {
  constructor(errorMessage: string) {
    super(403, 'forbidden', errorMessage);
    this.name = 'ForbiddenError';
  }
}

export class NotFoundError extends HttpError {
  constructor(errorMessage: string) {
    super(404, 'not found', errorMessage);
    this.name = 'NotFoundError';
  }
}

export class MethodNotAllowedError extends HttpError {
  constructor(errorMessage: string) {
    super(405, 'method not allowed', errorMessage);
    this.name = 'MethodNotAllowedError';
  }
}

/** 상태 코드 → HttpError 하위 클래스 */
export function httpErrorFor(statusCode: number, errorMessage: string): HttpError {
  switch (statusCode) {
    case 400:
      return new BadRequestError(errorMessage);
    case 401:
      return new UnauthorizedError(errorMessage);
    case 403:
      return new ForbiddenError(errorMessage);
    case 404:
      return new NotFoundError(errorMessage);
    case 405:
      return new MethodNotAllowedError(errorMessage);
    default:
      return new HttpError(statusCode, 'unexpected status', errorMessage);
  }
}

const RAW_PREVIEW_LIMIT = 200;

export class FrameDecodeError extends Error {
  /** 0부터 시작하는 프레임 순번 */
  readonly frameIndex: number;
  /** 문제 프레임 원문 (앞부분만) */
  readonly rawPreview: string;

  constructor(message: string, frameIndex: number, raw: string, options?: ErrorOptions) {
    super(`frame #${frameIndex}: ${message}`, options);
    this.name = 'FrameDecodeError';
    this.frameIndex = frameIndex;
    this.rawPreview = raw.length > RAW_PREVIEW_LIMIT ? `${raw.slice(0, RAW_PREVIEW_LIMIT)}…` : raw;
  }
}
