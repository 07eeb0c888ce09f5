import type { FrameDecodeError, TransportError } from '../errors.js';
import type { InstrumentName } from './primitives.js';

/** 스트림 오픈 요청 — 검증 후 동결, 이후 변경 없음 */
export interface StreamRequest {
  readonly instruments: readonly InstrumentName[];
  readonly snapshot: boolean;
  readonly includeHomeConversions: boolean;
}

/** 스트림 워커 상태 */
export type StreamState =
  | 'AWAITING_FRAME'
  | 'CLASSIFYING'
  | 'EMITTING'
  | 'CLOSED'
  | 'FAILED';

/** 알 수 없는 type으로 버려진 프레임 */
export interface DroppedFrame {
  readonly index: number;
  readonly type: string | null;
  readonly raw: string;
}

export type CloseReason = 'end-of-stream' | 'stopped';

interface OutcomeCounters {
  readonly framesProcessed: number;
  readonly droppedFrames: number;
}

export interface ClosedOutcome extends OutcomeCounters {
  readonly state: 'CLOSED';
  readonly reason: CloseReason;
}

export interface FailedOutcome extends OutcomeCounters {
  readonly state: 'FAILED';
  readonly error: FrameDecodeError | TransportError;
}

export type StreamOutcome = ClosedOutcome | FailedOutcome;
