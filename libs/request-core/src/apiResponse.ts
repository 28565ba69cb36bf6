import { REQUEST_ID_HEADER, getHeader } from './headers';
import type { HttpHeaders, RawHttpResponse } from './types';

/**
 * A decoded API response. Built once from a transport response and never
 * mutated afterwards.
 */
export class ApiResponse {
  readonly httpStatus: number;
  readonly httpHeaders: HttpHeaders;
  readonly httpBody: string;
  readonly data: unknown;
  readonly requestId?: string;

  private constructor(raw: RawHttpResponse, data: unknown) {
    this.httpStatus = raw.status;
    this.httpHeaders = raw.headers;
    this.httpBody = raw.body;
    this.data = data;
    this.requestId = getHeader(raw.headers, REQUEST_ID_HEADER);
  }

  /**
   * Decodes the JSON body. An empty body decodes to `null`; anything that is
   * not valid JSON throws the parser's SyntaxError.
   */
  static fromRaw(raw: RawHttpResponse): ApiResponse {
    const text = raw.body.trim();
    const data: unknown = text ? JSON.parse(text) : null;
    return new ApiResponse(raw, data);
  }
}

export function isSuccessStatus(status: number): boolean {
  return status >= 200 && status < 300;
}
