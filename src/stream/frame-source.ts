import type { Readable } from 'node:stream';

/**
 * 인증된 스트리밍 요청의 응답 본문.
 * close()는 대기 중인 읽기를 EOF 또는 에러로 풀어줘야 한다.
 */
export interface FrameSource {
  readonly chunks: AsyncIterable<Uint8Array | string>;
  close(): void | Promise<void>;
}

/**
 * 어느 종료 경로에서 몇 번 호출되든 내부 close()는 정확히 한 번만 실행
 */
export class OnceClosingSource implements FrameSource {
  private readonly inner: FrameSource;
  private closing: Promise<void> | null = null;

  constructor(inner: FrameSource) {
    this.inner = inner;
  }

  get chunks(): AsyncIterable<Uint8Array | string> {
    return this.inner.chunks;
  }

  get isClosed(): boolean {
    return this.closing !== null;
  }

  close(): Promise<void> {
    if (this.closing === null) {
      try {
        this.closing = Promise.resolve(this.inner.close());
      } catch (err) {
        this.closing = Promise.reject(err);
      }
    }
    return this.closing;
  }
}

/** undici 응답 본문(Readable) → FrameSource. close는 스트림 destroy */
export function fromReadable(body: Readable): FrameSource {
  return {
    chunks: body,
    close: () => {
      if (!body.destroyed) body.destroy();
    },
  };
}
