/**
 * カレンダーウィジェット用のエラー型
 * 認証切れとネットワーク障害を呼び出し側で区別できるようにする
 */

export enum ErrorCode {
  AUTH_REQUIRED = 'AUTH_REQUIRED',
  FETCH_FAILED = 'FETCH_FAILED',
  FETCH_TIMEOUT = 'FETCH_TIMEOUT',
  GRAPH_API_ERROR = 'GRAPH_API_ERROR',
  CONFIG_INVALID = 'CONFIG_INVALID',
}

export abstract class CalendarWidgetError extends Error {
  public readonly code: ErrorCode;
  public readonly isRetryable: boolean;

  constructor(message: string, code: ErrorCode, isRetryable = false, options?: { cause?: unknown }) {
    super(message, options);
    this.name = this.constructor.name;
    this.code = code;
    this.isRetryable = isRetryable;
  }
}

/**
 * 有効なセッションがなく、対話ログインも許可されていない
 */
export class AuthRequiredError extends CalendarWidgetError {
  constructor(message = 'Authentication required: no valid session and interactive login disabled', options?: { cause?: unknown }) {
    super(message, ErrorCode.AUTH_REQUIRED, false, options);
  }
}

export class TransientFetchError extends CalendarWidgetError {
  constructor(message: string, timedOut = false, options?: { cause?: unknown }) {
    super(message, timedOut ? ErrorCode.FETCH_TIMEOUT : ErrorCode.FETCH_FAILED, true, options);
  }
}

export class GraphApiError extends CalendarWidgetError {
  public readonly graphCode: string;

  constructor(graphCode: string, message: string) {
    super(`API Error: ${graphCode} - ${message}`, ErrorCode.GRAPH_API_ERROR);
    this.graphCode = graphCode;
  }
}

export class ConfigError extends CalendarWidgetError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, ErrorCode.CONFIG_INVALID, false, options);
  }
}

export function isAuthRequired(error: unknown): error is AuthRequiredError {
  return error instanceof AuthRequiredError;
}

/**
 * 時間をおけば回復しうるエラーか（タイムアウト・通信障害）
 */
export function isRetryableError(error: unknown): boolean {
  return error instanceof CalendarWidgetError && error.isRetryable;
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
