import { PassThrough } from 'node:stream';
import { describe, it, expect, vi } from 'vitest';
import { PriceStreamSession } from '../src/stream/session.js';
import { createStreamRequest } from '../src/pricing/stream-request.js';
import { FrameDecodeError, TransportError } from '../src/errors.js';
import { ZERO_DATE_TIME } from '../src/pricing/date-time.js';
import type { DroppedFrame, StreamEvent } from '../src/types/index.js';
import { collect, flush, PushSource, ReadableSource } from './helpers/push-source.js';

const request = createStreamRequest({ instruments: ['EUR_USD'] });

const HEARTBEAT = '{"type":"HEARTBEAT","time":"2025-01-01T00:00:00Z"}';
const PRICE =
  '{"type":"PRICE","time":"2025-01-01T00:00:01Z","bids":[{"price":"1.1000","liquidity":1000000}],' +
  '"asks":[{"price":"1.1002","liquidity":1000000}],"closeoutBid":"1.0999","closeoutAsk":"1.1003"}';
const UNKNOWN = '{"type":"UNKNOWN","x":1}';

async function consumeUntilError(session: PriceStreamSession, into: StreamEvent[]): Promise<unknown> {
  try {
    for await (const event of session) into.push(event);
  } catch (err) {
    return err;
  }
  return null;
}

describe('PriceStreamSession', () => {
  it('delivers heartbeat then price and drops the unknown frame', async () => {
    const source = PushSource.of(HEARTBEAT, PRICE, UNKNOWN);
    const dropped: DroppedFrame[] = [];
    const session = new PriceStreamSession(source, request, { onDroppedFrame: (f) => dropped.push(f) });

    const events = await collect(session);

    expect(events).toEqual([
      {
        type: 'HEARTBEAT',
        time: { iso: '2025-01-01T00:00:00Z', epochMs: 1735689600000, nanos: 0 },
      },
      {
        type: 'PRICE',
        time: { iso: '2025-01-01T00:00:01Z', epochMs: 1735689601000, nanos: 0 },
        bids: [{ price: '1.1000', liquidity: 1000000 }],
        asks: [{ price: '1.1002', liquidity: 1000000 }],
        closeoutBid: '1.0999',
        closeoutAsk: '1.1003',
      },
    ]);
    expect(dropped).toEqual([{ index: 2, type: 'UNKNOWN', raw: UNKNOWN }]);

    await expect(session.closed).resolves.toEqual({
      state: 'CLOSED',
      reason: 'end-of-stream',
      framesProcessed: 3,
      droppedFrames: 1,
    });
    expect(session.state).toBe('CLOSED');
    expect(source.closeCount).toBe(1);
  });

  it('keeps frame order across arbitrary chunk boundaries', async () => {
    const frames = Array.from({ length: 12 }, (_, i) =>
      i % 3 === 2 ? `{"type":"NEWS","seq":${i}}` : i % 2 === 0 ? PRICE : HEARTBEAT,
    );
    const text = frames.join('\n');
    const source = new PushSource();
    for (let i = 0; i < text.length; i += 7) source.push(text.slice(i, i + 7));
    source.end();

    const session = new PriceStreamSession(source, request, { channelCapacity: 3 });
    const types = (await collect(session)).map((e) => e.type);

    const expected = frames
      .filter((f) => !f.includes('NEWS'))
      .map((f) => (f === PRICE ? 'PRICE' : 'HEARTBEAT'));
    expect(types).toEqual(expected);
    expect(session.droppedFrames).toBe(4);
    expect(session.framesProcessed).toBe(12);
  });

  it('decodes the "0" time sentinel', async () => {
    const session = new PriceStreamSession(PushSource.of('{"type":"HEARTBEAT","time":"0"}'), request);
    const [event] = await collect(session);
    expect(event?.time).toBe(ZERO_DATE_TIME);
  });

  it('ends with a decode error on malformed JSON and delivers nothing after it', async () => {
    const source = PushSource.of(HEARTBEAT, '{"type":"PRICE",,}', HEARTBEAT, PRICE);
    const session = new PriceStreamSession(source, request);

    const received: StreamEvent[] = [];
    const err = await consumeUntilError(session, received);

    expect(err).toBeInstanceOf(FrameDecodeError);
    expect(received.map((e) => e.type)).toEqual(['HEARTBEAT']);

    const outcome = await session.closed;
    expect(outcome.state).toBe('FAILED');
    expect(outcome.state === 'FAILED' && outcome.error).toBe(err);
    expect(session.state).toBe('FAILED');
    expect(source.closeCount).toBe(1);
  });

  it('fails when a recognized frame has the wrong shape', async () => {
    const source = PushSource.of('{"type":"PRICE","time":"2025-01-01T00:00:01Z","bids":"none"}');
    const session = new PriceStreamSession(source, request);

    const err = await consumeUntilError(session, []);
    expect(err).toBeInstanceOf(FrameDecodeError);
    expect(err).toHaveProperty('message', expect.stringContaining('frame #0: PRICE frame does not match its shape'));
    expect(source.closeCount).toBe(1);
  });

  it('stops promptly while blocked handing off to a consumer that never reads', async () => {
    const source = new PushSource();
    source.push(HEARTBEAT);
    source.push(PRICE);
    const session = new PriceStreamSession(source, request);

    // 워커가 첫 프레임을 넘기려고 대기 중
    await vi.waitFor(() => expect(session.state).toBe('EMITTING'));
    expect(session.framesProcessed).toBe(1);

    session.stop();
    await expect(session.closed).resolves.toEqual({
      state: 'CLOSED',
      reason: 'stopped',
      framesProcessed: 1,
      droppedFrames: 0,
    });
    expect(source.closeCount).toBe(1);

    // 넘기지 못한 이벤트는 전달되지 않는다
    await expect(collect(session)).resolves.toEqual([]);
  });

  it('unblocks a pending read when the external signal aborts', async () => {
    const source = new PushSource();
    const controller = new AbortController();
    const session = new PriceStreamSession(source, request, { signal: controller.signal });

    controller.abort();
    const outcome = await session.closed;

    expect(outcome).toMatchObject({ state: 'CLOSED', reason: 'stopped', framesProcessed: 0 });
    expect(session.isStopRequested).toBe(true);
    expect(source.closeCount).toBe(1);
  });

  it('does not read at all when the signal is already aborted', async () => {
    const source = PushSource.of(HEARTBEAT);
    const session = new PriceStreamSession(source, request, { signal: AbortSignal.abort() });

    await expect(collect(session)).resolves.toEqual([]);
    await expect(session.closed).resolves.toMatchObject({ reason: 'stopped', framesProcessed: 0 });
    expect(source.closeCount).toBe(1);
  });

  it('treats a transport failure as a terminal error', async () => {
    const source = new PushSource();
    source.push(HEARTBEAT);
    const socketErr = new Error('socket hang up');
    source.fail(socketErr);
    const session = new PriceStreamSession(source, request);

    const received: StreamEvent[] = [];
    const err = await consumeUntilError(session, received);

    expect(received).toHaveLength(1);
    expect(err).toBeInstanceOf(TransportError);
    expect(err).toHaveProperty('message', 'stream read failed');
    expect(err).toHaveProperty('cause', socketErr);
    expect(source.closeCount).toBe(1);
  });

  it('treats clean closure with no bytes as end-of-stream', async () => {
    const source = PushSource.of();
    const session = new PriceStreamSession(source, request);

    await expect(collect(session)).resolves.toEqual([]);
    await expect(session.closed).resolves.toMatchObject({ state: 'CLOSED', reason: 'end-of-stream' });
    expect(source.closeCount).toBe(1);
  });

  it('stops the session when the consumer breaks out', async () => {
    const source = new PushSource();
    source.push(HEARTBEAT + PRICE + HEARTBEAT);
    const session = new PriceStreamSession(source, request);

    for await (const event of session) {
      expect(event.type).toBe('HEARTBEAT');
      break;
    }

    await expect(session.closed).resolves.toMatchObject({ state: 'CLOSED', reason: 'stopped' });
    expect(source.closeCount).toBe(1);
  });

  it('releases the source once even if stop is called repeatedly', async () => {
    const source = new PushSource();
    const session = new PriceStreamSession(source, request);

    session.stop();
    session.stop();
    await session.closed;
    session.stop();

    expect(source.closeCount).toBe(1);
  });

  it('ends as stopped when closing the source makes the pending read fail', async () => {
    const source = new PushSource();
    source.closeError = new Error('aborted');
    const session = new PriceStreamSession(source, request);

    session.stop();

    await expect(session.closed).resolves.toEqual({
      state: 'CLOSED',
      reason: 'stopped',
      framesProcessed: 0,
      droppedFrames: 0,
    });
    expect(session.state).toBe('CLOSED');
    expect(source.closeCount).toBe(1);
  });

  it('discards events still buffered when stopped', async () => {
    const source = new PushSource();
    source.push(HEARTBEAT);
    source.push(HEARTBEAT);
    source.push(HEARTBEAT);
    const session = new PriceStreamSession(source, request, { channelCapacity: 3 });

    // 세 이벤트 모두 버퍼에 들어가고 워커는 다음 읽기 대기
    await vi.waitFor(() => {
      expect(session.framesProcessed).toBe(3);
      expect(session.state).toBe('AWAITING_FRAME');
    });

    session.stop();

    await expect(collect(session)).resolves.toEqual([]);
    await expect(session.closed).resolves.toMatchObject({ state: 'CLOSED', reason: 'stopped', framesProcessed: 3 });
  });

  it('can only be iterated once', () => {
    const session = new PriceStreamSession(PushSource.of(), request);
    session[Symbol.asyncIterator]();
    expect(() => session[Symbol.asyncIterator]()).toThrow('can only be iterated once');
  });

  it('keeps running when the dropped-frame hook throws', async () => {
    const session = new PriceStreamSession(PushSource.of(UNKNOWN, HEARTBEAT), request, {
      onDroppedFrame: () => {
        throw new Error('hook failed');
      },
    });
    const events = await collect(session);
    expect(events.map((e) => e.type)).toEqual(['HEARTBEAT']);
    expect(session.droppedFrames).toBe(1);
  });
});

describe('PriceStreamSession over a response body', () => {
  it('stops in the middle of a frame and destroys the body once', async () => {
    const body = new PassThrough();
    const source = new ReadableSource(body);
    const session = new PriceStreamSession(source, request);

    body.write('{"type":"HEARTBEAT","ti');
    await flush();
    session.stop();

    await expect(session.closed).resolves.toMatchObject({ state: 'CLOSED', reason: 'stopped', framesProcessed: 0 });
    expect(source.closeCount).toBe(1);
    expect(body.destroyed).toBe(true);
  });

  it('fails with TransportError when the body is destroyed after an event', async () => {
    const body = new PassThrough();
    const source = new ReadableSource(body);
    const session = new PriceStreamSession(source, request);
    const socketErr = new Error('socket reset');

    body.write(HEARTBEAT);
    const received: StreamEvent[] = [];
    let caught: unknown = null;
    try {
      for await (const event of session) {
        received.push(event);
        body.destroy(socketErr);
      }
    } catch (err) {
      caught = err;
    }

    expect(received.map((e) => e.type)).toEqual(['HEARTBEAT']);
    expect(caught).toBeInstanceOf(TransportError);
    expect(caught).toHaveProperty('message', 'stream read failed');
    expect(caught).toHaveProperty('cause', socketErr);
    await expect(session.closed).resolves.toMatchObject({ state: 'FAILED', framesProcessed: 1 });
    expect(source.closeCount).toBe(1);
  });

  it('reads frames split across body chunks until the body ends', async () => {
    const body = new PassThrough();
    const source = new ReadableSource(body);
    const session = new PriceStreamSession(source, request);

    const text = `${HEARTBEAT}\n${PRICE}`;
    body.write(text.slice(0, 30));
    body.end(text.slice(30));

    const events = await collect(session);
    expect(events.map((e) => e.type)).toEqual(['HEARTBEAT', 'PRICE']);
    await expect(session.closed).resolves.toMatchObject({ state: 'CLOSED', reason: 'end-of-stream' });
    expect(source.closeCount).toBe(1);
  });
});
