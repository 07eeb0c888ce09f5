import { createChildLogger } from '../logger.js';
import type { StreamState } from '../types/index.js';

const log = createChildLogger('stream-state');

type StateTransition = [StreamState, StreamState];

/** 허용된 상태 전이 */
const VALID_TRANSITIONS: StateTransition[] = [
  ['AWAITING_FRAME', 'CLASSIFYING'],
  ['AWAITING_FRAME', 'CLOSED'],        // EOF 또는 프레임 경계에서 취소
  ['AWAITING_FRAME', 'FAILED'],        // JSON 디코드/전송 오류
  ['CLASSIFYING', 'EMITTING'],
  ['CLASSIFYING', 'AWAITING_FRAME'],   // 알 수 없는 type → 버림
  ['CLASSIFYING', 'CLOSED'],
  ['CLASSIFYING', 'FAILED'],
  ['EMITTING', 'AWAITING_FRAME'],
  ['EMITTING', 'CLOSED'],              // 전달 대기 중 취소
  ['EMITTING', 'FAILED'],              // 형태 불일치
  // CLOSED, FAILED는 종료 상태
];

const HISTORY_LIMIT = 100;

/**
 * 스트림 워커 상태 머신
 * 잘못된 전이 시도 시 에러
 */
export class StreamStateMachine {
  private state: StreamState = 'AWAITING_FRAME';
  private history: Array<{ from: StreamState; to: StreamState; at: number }> = [];

  get current(): StreamState {
    return this.state;
  }

  transition(to: StreamState): void {
    if (this.state === to) return; // noop

    if (!this.canTransition(to)) {
      const msg = `Invalid stream state transition: ${this.state} → ${to}`;
      log.error({ from: this.state, to }, msg);
      throw new Error(msg);
    }

    log.debug({ from: this.state, to }, 'Stream state transition');
    this.history.push({ from: this.state, to, at: Date.now() });
    this.state = to;

    // 프레임마다 전이가 생기므로 최근 것만 보관
    if (this.history.length > HISTORY_LIMIT) {
      this.history = this.history.slice(-HISTORY_LIMIT / 2);
    }
  }

  canTransition(to: StreamState): boolean {
    return VALID_TRANSITIONS.some(([from, target]) => from === this.state && target === to);
  }

  isTerminal(): boolean {
    return this.state === 'CLOSED' || this.state === 'FAILED';
  }

  getHistory(): ReadonlyArray<{ from: StreamState; to: StreamState; at: number }> {
    return this.history;
  }
}
