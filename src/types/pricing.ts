import type { DateTime, DecimalNumber, InstrumentName, PriceValue } from './primitives.js';

/** 특정 유동성에 대해 제시된 가격 */
export interface PriceBucket {
  readonly price: PriceValue;
  readonly liquidity: number;
}

export type PriceStatus = 'tradeable' | 'non-tradeable' | 'invalid';

/** 상품 quote 통화 수량 → 계좌 기준통화 환산 계수 */
export interface QuoteHomeConversionFactors {
  readonly positiveUnits: DecimalNumber;
  readonly negativeUnits: DecimalNumber;
}

/** type: "PRICE" 프레임 */
export interface PriceUpdate {
  readonly type: 'PRICE';
  readonly time: DateTime;
  readonly bids: readonly PriceBucket[];
  readonly asks: readonly PriceBucket[];
  readonly closeoutBid: PriceValue;
  readonly closeoutAsk: PriceValue;
  readonly instrument?: InstrumentName;
  readonly tradeable?: boolean;
  readonly status?: PriceStatus;
  readonly quoteHomeConversionFactors?: QuoteHomeConversionFactors;
}

/** type: "HEARTBEAT" 프레임 — 가격 데이터 없음 */
export interface Heartbeat {
  readonly type: 'HEARTBEAT';
  readonly time: DateTime;
}

export type StreamEvent = PriceUpdate | Heartbeat;

export type StreamEventType = StreamEvent['type'];
