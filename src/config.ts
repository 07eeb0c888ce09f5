import dotenv from 'dotenv';

// cwd의 .env — 없으면 process.env 그대로 사용
dotenv.config();

function env(key: string, fallback: string): string {
  return process.env[key] ?? fallback;
}

function envNum(key: string, fallback: number): number {
  const v = process.env[key];
  return v !== undefined && v.trim() !== '' ? Number(v) : fallback;
}

export const config = {
  oanda: {
    /** practice | live — 검증은 createStreamClientFromEnv에서 */
    environment: env('OANDA_ENVIRONMENT', 'practice'),
    apiKey: env('OANDA_API_KEY', ''),
    apiKeyDemo: env('OANDA_API_KEY_DEMO', ''),
    accountId: env('OANDA_ACCOUNT_ID', ''),
    /** 스트리밍 베이스 URL 강제 지정 (프록시/테스트용) */
    streamUrl: env('OANDA_STREAM_URL', ''),
  },

  stream: {
    /** 전달 채널 용량. 0 = 랑데부 (소비자가 받을 때까지 워커 대기) */
    channelCapacity: envNum('STREAM_CHANNEL_CAPACITY', 0),
    /** 스트림 오픈 시 응답 헤더 대기 시간. 본문 읽기에는 타임아웃 없음 */
    headersTimeoutMs: envNum('STREAM_HEADERS_TIMEOUT_MS', 10_000),
  },

  log: {
    level: env('LOG_LEVEL', 'info'),
  },
} as const;
