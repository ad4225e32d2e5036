/**
 * Semantic result codes carried in every response envelope.
 * The HTTP status is always 200; callers branch on `code`.
 */
export enum ResultCode {
  SUCCESS = 100,
  UNAUTHORIZED = 101,
  REQUEST_ERROR = 103,
  SERVER_ERROR = 104,
}

/** Uniform response wrapper returned by every endpoint. */
export interface ApiResult<T = unknown> {
  code: ResultCode;
  msg: string;
  data: T | null;
}

/**
 * What services hand back to controllers. The envelope interceptor turns it
 * into an `ApiResult` with `code = SUCCESS`.
 */
export interface ServiceResult<T = null> {
  message: string;
  data?: T;
}

export interface PageResult<T> {
  list: T[];
  total: number;
  page: number;
  size: number;
}
