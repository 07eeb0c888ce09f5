import type { z } from 'zod';
import { FrameDecodeError } from '../errors.js';
import {
  formatIssues,
  frameTypeSchema,
  heartbeatSchema,
  priceUpdateSchema,
} from '../exchange/oanda/schemas.js';
import type { StreamEvent, StreamEventType } from '../types/index.js';
import type { Frame } from './frame-decoder.js';

type EventDecoders = {
  readonly [K in StreamEventType]: z.ZodType<Extract<StreamEvent, { type: K }>, z.ZodTypeDef, unknown>;
};

/** 판별자 → 이벤트 스키마. 고정된 닫힌 테이블 */
const EVENT_DECODERS: EventDecoders = {
  PRICE: priceUpdateSchema,
  HEARTBEAT: heartbeatSchema,
};

function isEventType(type: string): type is StreamEventType {
  return Object.prototype.hasOwnProperty.call(EVENT_DECODERS, type);
}

/** type 필드만 읽는다. 없거나 문자열이 아니면 null */
export function readDiscriminator(value: unknown): string | null {
  const result = frameTypeSchema.safeParse(value);
  return result.success ? result.data.type : null;
}

/** 인식하는 type이면 그 값, 아니면 null (버릴 프레임) */
export function classifyFrame(frame: Frame): StreamEventType | null {
  const type = readDiscriminator(frame.value);
  return type !== null && isEventType(type) ? type : null;
}

/**
 * 판별자에 맞는 형태로 전체 디코딩.
 * 판별자는 맞는데 형태가 틀리면 FrameDecodeError (세션 종료 사유)
 */
export function materializeEvent(type: StreamEventType, frame: Frame): StreamEvent {
  const result = EVENT_DECODERS[type].safeParse(frame.value);
  if (!result.success) {
    throw new FrameDecodeError(
      `${type} frame does not match its shape (${formatIssues(result.error)})`,
      frame.index,
      frame.raw,
      { cause: result.error },
    );
  }
  return Object.freeze(result.data);
}
