import type { Dispatcher } from 'undici';
import { config } from './config.js';
import { ConfigurationError } from './errors.js';
import { createChildLogger } from './logger.js';
import {
  isOandaEnvironment,
  pricingStreamPath,
  streamBaseUrl,
  type OandaEnvironment,
} from './exchange/oanda/endpoints.js';
import { openStream } from './exchange/oanda/http.js';
import { createStreamRequest, toStreamQuery, type StreamRequestInput } from './pricing/stream-request.js';
import { PriceStreamSession, type StreamSessionOptions } from './stream/session.js';
import type { StreamRequest } from './types/index.js';

const log = createChildLogger('stream-client');

export interface StreamClientOptions {
  apiKey: string;
  accountId?: string;
  /** 기본 practice */
  environment?: OandaEnvironment;
  /** environment보다 우선하는 스트리밍 베이스 URL */
  streamUrl?: string;
  dispatcher?: Dispatcher;
  headersTimeoutMs?: number;
  /** 세션 기본 채널 용량. 기본 0 (랑데부) */
  channelCapacity?: number;
}

export type OpenPricingStreamOptions = StreamSessionOptions;

function assertCapacity(capacity: number): void {
  if (!Number.isInteger(capacity) || capacity < 0) {
    throw new ConfigurationError(`channel capacity must be a non-negative integer, got ${capacity}`);
  }
}

/**
 * 가격 스트리밍 클라이언트
 *
 * const client = new StreamClient({ apiKey, accountId: '101-001-0000000-001' });
 * const session = await client.openPricingStream({ instruments: ['EUR_USD'] });
 * for await (const event of session) { ... }
 */
export class StreamClient {
  readonly streamUrl: string;
  readonly accountId: string | null;

  private readonly apiKey: string;
  private readonly dispatcher: Dispatcher | undefined;
  private readonly headersTimeoutMs: number;
  private readonly channelCapacity: number;

  constructor(options: StreamClientOptions) {
    if (options.apiKey.trim() === '') {
      throw new ConfigurationError('API key is required');
    }
    const capacity = options.channelCapacity ?? 0;
    assertCapacity(capacity);
    const headersTimeoutMs = options.headersTimeoutMs ?? config.stream.headersTimeoutMs;
    if (!Number.isFinite(headersTimeoutMs) || headersTimeoutMs <= 0) {
      throw new ConfigurationError(`headers timeout must be a positive number, got ${headersTimeoutMs}`);
    }

    this.apiKey = options.apiKey;
    this.accountId = options.accountId ?? null;
    this.streamUrl = options.streamUrl ?? streamBaseUrl(options.environment ?? 'practice');
    this.dispatcher = options.dispatcher;
    this.headersTimeoutMs = headersTimeoutMs;
    this.channelCapacity = capacity;
  }

  /** 같은 설정, 다른 계좌 */
  withAccountId(accountId: string): StreamClient {
    return new StreamClient({
      apiKey: this.apiKey,
      accountId,
      streamUrl: this.streamUrl,
      dispatcher: this.dispatcher,
      headersTimeoutMs: this.headersTimeoutMs,
      channelCapacity: this.channelCapacity,
    });
  }

  /**
   * 가격 스트림 오픈.
   * 요청/계좌/용량 검증은 동기적으로 먼저 수행 — 실패 시 네트워크 I/O 없이 ConfigurationError throw.
   * 연결 실패는 TransportError / HttpError 로 reject.
   */
  openPricingStream(
    input: StreamRequestInput,
    options: OpenPricingStreamOptions = {},
  ): Promise<PriceStreamSession> {
    const request = createStreamRequest(input);
    const accountId = this.requireAccountId();
    const capacity = options.channelCapacity ?? this.channelCapacity;
    assertCapacity(capacity);

    return this.connect(request, accountId, { ...options, channelCapacity: capacity });
  }

  private async connect(
    request: StreamRequest,
    accountId: string,
    options: StreamSessionOptions,
  ): Promise<PriceStreamSession> {
    log.info({ accountId, instruments: request.instruments }, 'Opening pricing stream');
    const source = await openStream(this.streamUrl, pricingStreamPath(accountId), toStreamQuery(request), {
      apiKey: this.apiKey,
      dispatcher: this.dispatcher,
      headersTimeoutMs: this.headersTimeoutMs,
      signal: options.signal,
    });
    return new PriceStreamSession(source, request, options);
  }

  private requireAccountId(): string {
    if (this.accountId === null || this.accountId.trim() === '') {
      throw new ConfigurationError('account ID is required to open a pricing stream');
    }
    return this.accountId;
  }
}

/** 호출자용 종료 요청 */
export function stopStream(session: PriceStreamSession): void {
  session.stop();
}

/**
 * 환경 변수(.env)로 클라이언트 생성
 * live → OANDA_API_KEY, practice → OANDA_API_KEY_DEMO
 */
export function createStreamClientFromEnv(): StreamClient {
  const { environment, apiKey, apiKeyDemo, accountId, streamUrl } = config.oanda;
  if (!isOandaEnvironment(environment)) {
    throw new ConfigurationError(`OANDA_ENVIRONMENT must be "live" or "practice", got "${environment}"`);
  }

  const key = environment === 'live' ? apiKey : apiKeyDemo;
  if (key === '') {
    throw new ConfigurationError(`${environment === 'live' ? 'OANDA_API_KEY' : 'OANDA_API_KEY_DEMO'} not set`);
  }

  return new StreamClient({
    apiKey: key,
    accountId: accountId || undefined,
    environment,
    streamUrl: streamUrl || undefined,
    channelCapacity: config.stream.channelCapacity,
  });
}
