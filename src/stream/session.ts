import { createChildLogger } from '../logger.js';
import { FrameDecodeError, TransportError } from '../errors.js';
import type {
  CloseReason,
  DroppedFrame,
  StreamEvent,
  StreamOutcome,
  StreamRequest,
  StreamState,
} from '../types/index.js';
import { DeliveryChannel } from './delivery-channel.js';
import { classifyFrame, materializeEvent, readDiscriminator } from './dispatcher.js';
import { JsonFrameDecoder, type Frame } from './frame-decoder.js';
import { OnceClosingSource, type FrameSource } from './frame-source.js';
import { StreamStateMachine } from './state-machine.js';

const log = createChildLogger('price-stream');

export interface StreamSessionOptions {
  /** 외부 취소 토큰. abort 시 stop()과 동일 */
  signal?: AbortSignal;
  /** 전달 채널 용량. 기본 0 (랑데부). stop() 시 버퍼에 남은 이벤트는 버려진다 */
  channelCapacity?: number;
  /** 알 수 없는 type으로 버려진 프레임 진단 훅 */
  onDroppedFrame?: (frame: DroppedFrame) => void;
}

/**
 * 가격 스트림 세션 — 열린 연결 하나를 끝까지 소유하는 단일 워커
 *
 * 루프: 취소 확인 → 프레임 대기 → 판별 → 디코딩 → 채널 핸드오프
 *
 * - 취소는 프레임 경계에서 확인. 핸드오프 대기 중에는 즉시 반영
 * - 중단되면 채널 버퍼에 남은 이벤트도 전달하지 않는다
 * - stop()은 연결도 닫아서 대기 중인 읽기를 풀어준다
 * - 연결은 어떤 경로로 끝나든 정확히 한 번 닫힌다
 * - 소비자는 for await 로 한 번만 순회 가능. break 하면 세션도 멈춘다
 */
export class PriceStreamSession implements AsyncIterable<StreamEvent> {
  readonly request: StreamRequest;
  /** 세션 종료 결과. reject 되지 않는다 */
  readonly closed: Promise<StreamOutcome>;

  private readonly source: OnceClosingSource;
  private readonly decoder: JsonFrameDecoder;
  private readonly channel: DeliveryChannel<StreamEvent>;
  private readonly stateMachine = new StreamStateMachine();
  private readonly controller = new AbortController();
  private readonly externalSignal: AbortSignal | null;
  private readonly onDroppedFrame: ((frame: DroppedFrame) => void) | null;

  private frames = 0;
  private dropped = 0;
  private iterated = false;

  constructor(source: FrameSource, request: StreamRequest, options: StreamSessionOptions = {}) {
    this.request = request;
    this.source = new OnceClosingSource(source);
    this.decoder = new JsonFrameDecoder(this.source.chunks);
    this.channel = new DeliveryChannel<StreamEvent>(options.channelCapacity ?? 0);
    this.onDroppedFrame = options.onDroppedFrame ?? null;
    this.externalSignal = options.signal ?? null;

    // 읽기 대기 중 취소 → 연결을 닫아 대기 해제
    this.controller.signal.addEventListener('abort', this.releaseOnAbort, { once: true });

    if (this.externalSignal?.aborted) {
      this.stop();
    } else {
      this.externalSignal?.addEventListener('abort', this.onExternalAbort, { once: true });
    }

    this.closed = this.run();
  }

  get state(): StreamState {
    return this.stateMachine.current;
  }

  /** 지금까지 읽은 프레임 수 (버린 프레임 포함) */
  get framesProcessed(): number {
    return this.frames;
  }

  get droppedFrames(): number {
    return this.dropped;
  }

  get isStopRequested(): boolean {
    return this.controller.signal.aborted;
  }

  /** 협조적 종료 요청. 여러 번 호출해도 된다 */
  stop(): void {
    if (this.controller.signal.aborted) return;
    log.info({ framesProcessed: this.frames }, 'Stream stop requested');
    this.controller.abort();
  }

  [Symbol.asyncIterator](): AsyncIterator<StreamEvent, undefined> {
    if (this.iterated) {
      throw new Error('PriceStreamSession can only be iterated once');
    }
    this.iterated = true;

    return {
      next: () => this.channel.receive(),
      return: async () => {
        this.stop();
        await this.closed;
        return { value: undefined, done: true };
      },
    };
  }

  // ── 워커 ──────────────────────────────────────────────────────

  private async run(): Promise<StreamOutcome> {
    log.info(
      {
        instruments: this.request.instruments,
        snapshot: this.request.snapshot,
        capacity: this.channel.capacity,
      },
      'Pricing stream opened',
    );

    let outcome: StreamOutcome;
    try {
      const reason = await this.loop();
      this.stateMachine.transition('CLOSED');
      if (reason === 'stopped') this.discardBuffered();
      this.channel.close();
      outcome = this.closedOutcome(reason);
    } catch (err) {
      outcome = this.handleFailure(err);
    } finally {
      this.externalSignal?.removeEventListener('abort', this.onExternalAbort);
      await this.releaseSource();
    }

    if (outcome.state === 'CLOSED') {
      log.info({ reason: outcome.reason, framesProcessed: this.frames, droppedFrames: this.dropped }, 'Pricing stream closed');
    }
    return outcome;
  }

  private async loop(): Promise<CloseReason> {
    const signal = this.controller.signal;

    for (;;) {
      // 프레임 경계 취소 확인
      if (signal.aborted) return 'stopped';

      const frame = await this.decoder.next();
      if (frame === null) return signal.aborted ? 'stopped' : 'end-of-stream';
      this.frames++;

      this.stateMachine.transition('CLASSIFYING');
      const type = classifyFrame(frame);
      if (type === null) {
        this.drop(frame);
        this.stateMachine.transition('AWAITING_FRAME');
        continue;
      }

      this.stateMachine.transition('EMITTING');
      const event = materializeEvent(type, frame);

      // 백프레셔: 소비자가 받을 때까지 대기, 취소와 경쟁
      const delivered = await this.channel.send(event, signal);
      if (!delivered) return 'stopped';

      this.stateMachine.transition('AWAITING_FRAME');
    }
  }

  private handleFailure(err: unknown): StreamOutcome {
    // stop()으로 연결을 닫아서 생긴 읽기 에러는 실패가 아니다
    if (this.controller.signal.aborted) {
      log.debug({ err }, 'Read interrupted by stop');
      this.stateMachine.transition('CLOSED');
      this.discardBuffered();
      this.channel.close();
      return this.closedOutcome('stopped');
    }

    const error =
      err instanceof FrameDecodeError || err instanceof TransportError
        ? err
        : new TransportError('stream read failed', { cause: err });

    log.error({ err: error, framesProcessed: this.frames, state: this.stateMachine.current }, 'Pricing stream failed');
    this.stateMachine.transition('FAILED');
    this.channel.close(error);
    return { state: 'FAILED', error, framesProcessed: this.frames, droppedFrames: this.dropped };
  }

  private drop(frame: Frame): void {
    this.dropped++;
    const dropped: DroppedFrame = { index: frame.index, type: readDiscriminator(frame.value), raw: frame.raw };
    log.debug({ index: dropped.index, type: dropped.type }, 'Dropped frame with unrecognized type');

    if (!this.onDroppedFrame) return;
    try {
      this.onDroppedFrame(dropped);
    } catch (err) {
      log.warn({ err, index: dropped.index }, 'onDroppedFrame hook threw');
    }
  }

  // 중단 후에는 아무것도 전달하지 않는다
  private discardBuffered(): void {
    const discarded = this.channel.discard();
    if (discarded > 0) log.debug({ discarded }, 'Discarded buffered events on stop');
  }

  private closedOutcome(reason: CloseReason): StreamOutcome {
    return { state: 'CLOSED', reason, framesProcessed: this.frames, droppedFrames: this.dropped };
  }

  private releaseSource(): Promise<void> {
    return this.source.close().catch((err: unknown) => {
      log.warn({ err }, 'Failed to close stream source');
    });
  }

  private readonly releaseOnAbort = (): void => {
    void this.releaseSource();
  };

  private readonly onExternalAbort = (): void => {
    this.stop();
  };
}
