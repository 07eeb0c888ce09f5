import { request as undiciRequest, type Dispatcher } from 'undici';
import { createChildLogger, SERVICE_NAME } from '../../logger.js';
import { httpErrorFor, TransportError, type HttpError } from '../../errors.js';
import { fromReadable, type FrameSource } from '../../stream/frame-source.js';
import { errorResponseSchema } from './schemas.js';

const log = createChildLogger('oanda-http');

const DEFAULT_HEADERS_TIMEOUT_MS = 10_000;
const USER_AGENT = `${SERVICE_NAME}/0.1.0 (node ${process.version}; ${process.platform}/${process.arch})`;

export interface OpenStreamOptions {
  apiKey: string;
  /** 테스트/프록시용 undici dispatcher. 없으면 global dispatcher */
  dispatcher?: Dispatcher;
  headersTimeoutMs?: number;
  signal?: AbortSignal;
}

export function streamHeaders(apiKey: string): Record<string, string> {
  return {
    Authorization: `Bearer ${apiKey}`,
    Accept: 'application/json',
    'Accept-Datetime-Format': 'RFC3339',
    'User-Agent': USER_AGENT,
  };
}

/**
 * 스트리밍 GET — 응답 헤더까지만 기다리고 본문은 FrameSource로 넘긴다.
 * 본문 읽기 타임아웃 없음 (장시간 연결). 재시도 없음.
 *
 * 연결 실패 → TransportError, 200 이외 → HttpError 하위 클래스
 */
export async function openStream(
  baseUrl: string,
  path: string,
  query: Record<string, string>,
  options: OpenStreamOptions,
): Promise<FrameSource> {
  const url = new URL(path, baseUrl);
  Object.entries(query).forEach(([k, v]) => url.searchParams.set(k, v));

  let response: Dispatcher.ResponseData;
  try {
    response = await undiciRequest(url, {
      method: 'GET',
      headers: streamHeaders(options.apiKey),
      headersTimeout: options.headersTimeoutMs ?? DEFAULT_HEADERS_TIMEOUT_MS,
      bodyTimeout: 0,
      dispatcher: options.dispatcher,
      signal: options.signal,
    });
  } catch (err) {
    log.error({ err, path }, 'Failed to open stream');
    throw new TransportError(`Failed to open stream ${path}`, { cause: err });
  }

  if (response.statusCode !== 200) {
    throw await decodeErrorResponse(response.statusCode, response.body);
  }

  log.debug({ path, statusCode: response.statusCode }, 'Stream response received');
  return fromReadable(response.body);
}

/**
 * 에러 응답 본문 { errorMessage } → HttpError.
 * JSON이 아니면 본문 원문을 메시지로 사용
 */
export async function decodeErrorResponse(
  statusCode: number,
  body: Dispatcher.ResponseData['body'],
): Promise<HttpError> {
  let text: string;
  try {
    text = await body.text();
  } catch (err) {
    log.warn({ err, statusCode }, 'Could not read error response body');
    text = '';
  }

  const parsed = errorResponseSchema.safeParse(parseJson(text));
  const message = parsed.success ? parsed.data.errorMessage : text.trim() || `HTTP ${statusCode}`;

  log.warn({ statusCode, errorMessage: message }, 'Stream request rejected');
  return httpErrorFor(statusCode, message);
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text) as unknown;
  } catch {
    return undefined;
  }
}
