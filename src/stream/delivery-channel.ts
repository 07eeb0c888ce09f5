interface PendingSend<T> {
  readonly value: T;
  settle(delivered: boolean): void;
}

interface PendingReceive<T> {
  resolve(result: IteratorResult<T, undefined>): void;
  reject(err: unknown): void;
}

const DONE: IteratorReturnResult<undefined> = Object.freeze({ value: undefined, done: true });

/**
 * 단일 생산자 / 단일 소비자 바운디드 핸드오프
 *
 * - capacity 0 (기본): 랑데부. 소비자가 값을 가져가야 send()가 끝난다
 * - capacity n: 버퍼에 n개까지 쌓고, 가득 차면 생산자 대기
 * - send()는 signal과 경쟁한다. signal이 먼저 오면 false (값은 전달되지 않음)
 * - close(error): 버퍼를 모두 소비한 뒤 done, error가 있으면 한 번 throw 후 done
 * - discard(): 아직 소비되지 않은 버퍼 폐기 (중단 시)
 */
export class DeliveryChannel<T> {
  readonly capacity: number;

  private buffer: Array<{ value: T }> = [];
  private pendingSend: PendingSend<T> | null = null;
  private pendingReceive: PendingReceive<T> | null = null;
  private closed = false;
  private failure: { error: unknown } | null = null;

  constructor(capacity: number = 0) {
    if (!Number.isInteger(capacity) || capacity < 0) {
      throw new RangeError(`DeliveryChannel capacity must be a non-negative integer, got ${capacity}`);
    }
    this.capacity = capacity;
  }

  get size(): number {
    return this.buffer.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  send(value: T, signal?: AbortSignal): Promise<boolean> {
    if (this.closed || signal?.aborted) return Promise.resolve(false);
    if (this.pendingSend) {
      return Promise.reject(new Error('DeliveryChannel allows a single producer'));
    }

    // 소비자가 이미 기다리는 중 → 바로 넘김
    const receiver = this.pendingReceive;
    if (receiver) {
      this.pendingReceive = null;
      receiver.resolve({ value, done: false });
      return Promise.resolve(true);
    }

    if (this.buffer.length < this.capacity) {
      this.buffer.push({ value });
      return Promise.resolve(true);
    }

    return new Promise<boolean>((resolve) => {
      const onAbort = (): void => {
        if (this.pendingSend !== pending) return;
        this.pendingSend = null;
        resolve(false);
      };
      const pending: PendingSend<T> = {
        value,
        settle: (delivered) => {
          signal?.removeEventListener('abort', onAbort);
          resolve(delivered);
        },
      };
      this.pendingSend = pending;
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  receive(): Promise<IteratorResult<T, undefined>> {
    if (this.pendingReceive) {
      return Promise.reject(new Error('DeliveryChannel allows a single consumer'));
    }

    const head = this.buffer.shift();
    if (head) {
      this.promotePendingSend();
      return Promise.resolve({ value: head.value, done: false });
    }

    // 랑데부: 대기 중인 생산자 값을 직접 가져감
    const sender = this.pendingSend;
    if (sender) {
      this.pendingSend = null;
      sender.settle(true);
      return Promise.resolve({ value: sender.value, done: false });
    }

    if (this.closed) return this.drainedResult();

    return new Promise<IteratorResult<T, undefined>>((resolve, reject) => {
      this.pendingReceive = { resolve, reject };
    });
  }

  close(error?: unknown): void {
    if (this.closed) return;
    this.closed = true;
    if (error !== undefined) this.failure = { error };

    // 닫는 쪽이 생산자이므로 보통 없지만, 남아있다면 전달 실패로 끝낸다
    const sender = this.pendingSend;
    if (sender) {
      this.pendingSend = null;
      sender.settle(false);
    }

    const receiver = this.pendingReceive;
    if (receiver) {
      this.pendingReceive = null;
      const failure = this.takeFailure();
      if (failure) receiver.reject(failure.error);
      else receiver.resolve(DONE);
    }
  }

  /** 버퍼에 남은 값을 버린다. 버린 개수 반환 */
  discard(): number {
    const count = this.buffer.length;
    this.buffer = [];
    return count;
  }

  private promotePendingSend(): void {
    const sender = this.pendingSend;
    if (!sender || this.buffer.length >= this.capacity) return;
    this.pendingSend = null;
    this.buffer.push({ value: sender.value });
    sender.settle(true);
  }

  private drainedResult(): Promise<IteratorResult<T, undefined>> {
    const failure = this.takeFailure();
    return failure ? Promise.reject(failure.error) : Promise.resolve(DONE);
  }

  /** 종료 에러는 소비자에게 한 번만 전달 */
  private takeFailure(): { error: unknown } | null {
    const failure = this.failure;
    this.failure = null;
    return failure;
  }
}
