import { z } from 'zod';
import { parseDateTime, ZERO_DATE_TIME } from '../../pricing/date-time.js';
import type { DateTime, Heartbeat, PriceUpdate } from '../../types/index.js';

/** 스트림이 "미설정 시각"으로 보내는 값 */
export const ZERO_TIME_SENTINEL = '0';

// ─── 공통 ────────────────────────────────────────────────────────────────

export const priceValueSchema = z.string().regex(/^-?\d+(\.\d+)?$/, 'expected a decimal string');

/**
 * 스트림 time 필드. "0"은 ZERO_DATE_TIME으로 디코딩.
 * 센티널 허용은 이 스키마에만 둔다.
 */
export const streamTimeSchema = z.string().transform((text, ctx): DateTime => {
  if (text === ZERO_TIME_SENTINEL) return ZERO_DATE_TIME;
  const parsed = parseDateTime(text);
  if (!parsed) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `invalid timestamp "${text}"` });
    return z.NEVER;
  }
  return parsed;
});

// ─── 스트림 프레임 ───────────────────────────────────────────────────────

/** 판별자만 읽는 최소 형태 */
export const frameTypeSchema = z.object({ type: z.string() });

export const priceBucketSchema = z.object({
  price: priceValueSchema,
  liquidity: z.number().int().positive(),
});

export const quoteHomeConversionFactorsSchema = z.object({
  positiveUnits: priceValueSchema,
  negativeUnits: priceValueSchema,
});

export const priceUpdateSchema: z.ZodType<PriceUpdate, z.ZodTypeDef, unknown> = z
  .object({
    type: z.literal('PRICE'),
    time: streamTimeSchema,
    bids: z.array(priceBucketSchema),
    asks: z.array(priceBucketSchema),
    closeoutBid: priceValueSchema,
    closeoutAsk: priceValueSchema,
    instrument: z.string().optional(),
    tradeable: z.boolean().optional(),
    status: z.enum(['tradeable', 'non-tradeable', 'invalid']).optional(),
    quoteHomeConversionFactors: quoteHomeConversionFactorsSchema.optional(),
  })
  .superRefine((price, ctx) => {
    if (price.tradeable !== true) return;
    if (price.bids.length === 0) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['bids'], message: 'tradeable price has no bids' });
    }
    if (price.asks.length === 0) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['asks'], message: 'tradeable price has no asks' });
    }
  });

/** 알 수 없는 키는 버린다 — 하트비트에 가격 필드가 섞여 나가지 않도록 */
export const heartbeatSchema: z.ZodType<Heartbeat, z.ZodTypeDef, unknown> = z.object({
  type: z.literal('HEARTBEAT'),
  time: streamTimeSchema,
});

// ─── 에러 응답 ───────────────────────────────────────────────────────────

export const errorResponseSchema = z.object({
  errorMessage: z.string(),
  errorCode: z.string().optional(),
});

/** zod 이슈 → "path: message; ..." 한 줄 */
export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}
