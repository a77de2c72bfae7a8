import { vi, type Mock } from 'vitest';
import type { HttpTransport, RawResponse, RequestOptions } from '../transport/http-transport.js';

export interface MockHttpTransport extends HttpTransport {
  get: Mock<[string, RequestOptions?], Promise<RawResponse>>;
  post: Mock<[string, unknown, RequestOptions?], Promise<RawResponse>>;
}

export interface MockRawResponse extends RawResponse {
  text: Mock<[], Promise<string>>;
  close: Mock<[], Promise<void>>;
}

export function createMockHttpTransport(): MockHttpTransport {
  return {
    get: vi.fn<[string, RequestOptions?], Promise<RawResponse>>(),
    post: vi.fn<[string, unknown, RequestOptions?], Promise<RawResponse>>(),
  };
}

/**
 * Creates a response whose body is the given text.
 */
export function createMockRawResponse(body: string, statusCode = 200): MockRawResponse {
  return {
    statusCode,
    headers: { 'content-type': 'application/json' },
    text: vi.fn<[], Promise<string>>().mockResolvedValue(body),
    close: vi.fn<[], Promise<void>>().mockResolvedValue(undefined),
  };
}

export function createMockJsonResponse(body: unknown, statusCode = 200): MockRawResponse {
  return createMockRawResponse(JSON.stringify(body), statusCode);
}
