import { FrameDecodeError } from '../errors.js';

/** 스트림에서 잘라낸 최상위 JSON 값 하나 */
export interface Frame {
  readonly index: number;
  readonly raw: string;
  readonly value: unknown;
}

const WHITESPACE = new Set([' ', '\t', '\n', '\r']);

/**
 * 구분자 없는 JSON 객체 스트림 디코더
 *
 * {"type":"HEARTBEAT",...}{"type":"PRICE",...}\n{"type":"PRICE",...}
 *
 * - 감싸는 배열/개행/전체 개수 없이 JSON 자체의 괄호 균형으로 프레임 경계를 찾는다
 * - 청크 경계가 멀티바이트 문자나 문자열 이스케이프 한가운데여도 된다
 * - 최상위는 객체만 허용. 그 외 문자, 파싱 실패, 프레임 중간 EOF → FrameDecodeError
 * - 에러 이후에는 재동기화하지 않는다: 같은 에러를 계속 throw
 * - 청크 iterator가 던진 에러(전송 오류)는 그대로 전파
 */
export class JsonFrameDecoder {
  private readonly iterator: AsyncIterator<Uint8Array | string>;
  private readonly textDecoder = new TextDecoder('utf-8');

  private buffer = '';
  private scanPos = 0;
  private frameStart = -1;
  private depth = 0;
  private inString = false;
  private escaped = false;

  private frameCount = 0;
  private ended = false;
  private failure: unknown = null;

  constructor(chunks: AsyncIterable<Uint8Array | string>) {
    this.iterator = chunks[Symbol.asyncIterator]();
  }

  /** 지금까지 잘라낸 프레임 수 */
  get framesDecoded(): number {
    return this.frameCount;
  }

  /** 다음 프레임. 스트림이 깨끗하게 끝나면 null */
  async next(): Promise<Frame | null> {
    if (this.failure !== null) throw this.failure;

    try {
      for (;;) {
        const frame = this.extract();
        if (frame) return frame;
        if (this.ended) return this.finish();

        const chunk = await this.iterator.next();
        if (chunk.done) {
          this.ended = true;
          this.buffer += this.textDecoder.decode();
        } else if (typeof chunk.value === 'string') {
          this.buffer += chunk.value;
        } else {
          this.buffer += this.textDecoder.decode(chunk.value, { stream: true });
        }
      }
    } catch (err) {
      this.failure = err;
      throw err;
    }
  }

  private extract(): Frame | null {
    const buf = this.buffer;

    for (let i = this.scanPos; i < buf.length; i++) {
      const ch = buf.charAt(i);

      if (this.depth === 0) {
        if (WHITESPACE.has(ch)) continue;
        if (ch !== '{') {
          throw new FrameDecodeError(
            `unexpected ${JSON.stringify(ch)} where a JSON object should start`,
            this.frameCount,
            buf.slice(i),
          );
        }
        this.frameStart = i;
        this.depth = 1;
        continue;
      }

      if (this.inString) {
        if (this.escaped) this.escaped = false;
        else if (ch === '\\') this.escaped = true;
        else if (ch === '"') this.inString = false;
        continue;
      }

      switch (ch) {
        case '"':
          this.inString = true;
          break;
        case '{':
        case '[':
          this.depth++;
          break;
        case '}':
        case ']':
          this.depth--;
          if (this.depth === 0) {
            const raw = buf.slice(this.frameStart, i + 1);
            this.buffer = buf.slice(i + 1);
            this.scanPos = 0;
            this.frameStart = -1;
            return this.parse(raw);
          }
          break;
      }
    }

    if (this.depth === 0) {
      // 프레임 사이 공백만 남음
      this.buffer = '';
      this.scanPos = 0;
    } else {
      // 진행 중인 프레임 앞부분은 버린다
      this.buffer = buf.slice(this.frameStart);
      this.scanPos = this.buffer.length;
      this.frameStart = 0;
    }
    return null;
  }

  private parse(raw: string): Frame {
    const index = this.frameCount++;
    let value: unknown;
    try {
      value = JSON.parse(raw) as unknown;
    } catch (err) {
      throw new FrameDecodeError('malformed JSON', index, raw, { cause: err });
    }
    return { index, raw, value };
  }

  private finish(): null {
    if (this.depth > 0) {
      throw new FrameDecodeError('stream ended inside a frame', this.frameCount, this.buffer);
    }
    return null;
  }
}
