/**
 * v20 스트리밍 엔드포인트 — 단일 정의.
 * 코드 어디에서도 문자열 URL을 직접 쓰지 않고 이 상수만 사용한다.
 */

export type OandaEnvironment = 'live' | 'practice';

export const STREAM_BASE_LIVE = 'https://stream-fxtrade.oanda.com';
export const STREAM_BASE_PRACTICE = 'https://stream-fxpractice.oanda.com';

export function streamBaseUrl(environment: OandaEnvironment): string {
  return environment === 'live' ? STREAM_BASE_LIVE : STREAM_BASE_PRACTICE;
}

export function isOandaEnvironment(value: string): value is OandaEnvironment {
  return value === 'live' || value === 'practice';
}

/** GET 가격 스트림 */
export function pricingStreamPath(accountId: string): string {
  return `/v3/accounts/${encodeURIComponent(accountId)}/pricing/stream`;
}
