import { z } from 'zod';
import { ConfigurationError } from '../errors.js';
import { formatIssues } from '../exchange/oanda/schemas.js';
import type { StreamRequest } from '../types/index.js';

/** EUR_USD, XAU_USD, SPX500_USD ... */
const INSTRUMENT_PATTERN = /^[A-Z0-9]+_[A-Z0-9]+$/;

const streamRequestSchema = z.object({
  instruments: z
    .array(z.string().trim().regex(INSTRUMENT_PATTERN, 'instrument must look like EUR_USD'))
    .min(1, 'at least one instrument is required')
    .refine((list) => new Set(list).size === list.length, 'instruments must be unique'),
  snapshot: z.boolean().default(true),
  includeHomeConversions: z.boolean().default(false),
});

export interface StreamRequestInput {
  instruments: readonly string[];
  /** 오픈 직후 현재가 스냅샷 전송 여부 (기본 true) */
  snapshot?: boolean;
  /** 기준통화 환산 계수 포함 여부 (기본 false) */
  includeHomeConversions?: boolean;
}

/**
 * 요청 검증 후 동결. 연결을 열기 전에 한 번만 호출된다.
 * 실패 시 ConfigurationError (동기)
 */
export function createStreamRequest(input: StreamRequestInput): StreamRequest {
  const result = streamRequestSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigurationError(`Invalid stream request: ${formatIssues(result.error)}`, {
      cause: result.error,
    });
  }
  const { instruments, snapshot, includeHomeConversions } = result.data;
  return Object.freeze({
    instruments: Object.freeze([...instruments]),
    snapshot,
    includeHomeConversions,
  });
}

/** 스트리밍 엔드포인트 쿼리 파라미터 */
export function toStreamQuery(request: StreamRequest): Record<string, string> {
  return {
    instruments: request.instruments.join(','),
    snapShot: String(request.snapshot),
    includeHomeConversions: String(request.includeHomeConversions),
  };
}
