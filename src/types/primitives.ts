/** "EUR_USD", "USD_JPY" 처럼 base_quote 형식의 상품명 */
export type InstrumentName = string;

/** 가격 값 — 정밀도 유지를 위해 십진수 문자열 그대로 보관 */
export type PriceValue = string;

/** 십진수 문자열 (환산 계수 등) */
export type DecimalNumber = string;

/**
 * 스트림 타임스탬프.
 * JS Date는 ms 정밀도라 초 미만 부분은 nanos로 따로 보관한다.
 */
export interface DateTime {
  readonly iso: string;
  readonly epochMs: number;     // Unix ms (초 미만 ms까지 포함)
  readonly nanos: number;       // 초 미만 부분 (0 ~ 999_999_999 ns)
}
