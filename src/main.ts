import { createStreamClientFromEnv } from './client.js';
import { createChildLogger } from './logger.js';

const log = createChildLogger('main');

// ── CLI 인자: 상품 목록 (기본 EUR_USD) ──
function parseInstruments(): string[] {
  const idx = process.argv.indexOf('--instruments');
  const value = idx !== -1 ? process.argv[idx + 1] : undefined;
  return value ? value.split(',') : ['EUR_USD'];
}

async function main(): Promise<void> {
  const instruments = parseInstruments();
  const client = createStreamClientFromEnv();
  const session = await client.openPricingStream(
    { instruments, snapshot: !process.argv.includes('--no-snapshot') },
    {
      onDroppedFrame: (frame) => log.warn({ index: frame.index, type: frame.type }, 'Unrecognized frame dropped'),
    },
  );

  // ── Graceful shutdown ──
  const shutdown = (signal: string) => {
    log.info({ signal }, 'Shutting down');
    session.stop();
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));

  for await (const event of session) {
    if (event.type === 'PRICE') {
      log.info(
        {
          instrument: event.instrument,
          time: event.time.iso,
          bid: event.bids[0]?.price,
          ask: event.asks[0]?.price,
        },
        'Price',
      );
    } else {
      log.debug({ time: event.time.iso }, 'Heartbeat');
    }
  }

  // 실패는 for await 에서 throw 되므로 여기는 정상 종료뿐
  const outcome = await session.closed;
  log.info({ state: outcome.state, framesProcessed: outcome.framesProcessed }, 'Stream finished');
}

main().catch((err) => {
  log.fatal({ err }, 'Fatal error');
  process.exit(1);
});
