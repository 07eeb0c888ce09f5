import type { DateTime } from '../types/index.js';

/**
 * 확장 RFC3339: 2025-01-01T00:00:00.123456789Z 또는 +09:00 오프셋.
 * 초 미만 자릿수는 최대 9자리(ns).
 */
const RFC3339_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})(?:\.(\d{1,9}))?(Z|[+-]\d{2}:\d{2})$/;

/** 0001-01-01T00:00:00Z */
const ZERO_EPOCH_MS = -62_135_596_800_000;

/** "미설정" 시각. 스트림의 time: "0" 센티널이 이 값으로 디코딩된다 */
export const ZERO_DATE_TIME: DateTime = Object.freeze({
  iso: '0001-01-01T00:00:00Z',
  epochMs: ZERO_EPOCH_MS,
  nanos: 0,
});

export function isZeroTime(t: DateTime): boolean {
  return t.epochMs === ZERO_EPOCH_MS && t.nanos === 0;
}

/**
 * RFC3339 문자열 → DateTime. 형식/범위가 틀리면 null.
 * "0" 센티널은 여기서 처리하지 않는다 (스트림 time 필드 전용).
 */
export function parseDateTime(text: string): DateTime | null {
  const m = RFC3339_PATTERN.exec(text);
  if (!m) return null;

  const [, y, mo, d, h, mi, s, fraction, zone] = m;
  const year = Number(y);
  const month = Number(mo);
  const day = Number(d);
  const hour = Number(h);
  const minute = Number(mi);
  const second = Number(s);

  if (month < 1 || month > 12 || hour > 23 || minute > 59 || second > 59) return null;

  // Date.UTC는 0~99년을 1900년대로 해석하므로 setUTCFullYear 사용
  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);
  date.setUTCHours(hour, minute, second, 0);
  // 2월 30일 등 존재하지 않는 날짜는 다음 달로 넘어간다
  if (date.getUTCDate() !== day || date.getUTCMonth() !== month - 1) return null;

  const nanos = fraction ? Number(fraction.padEnd(9, '0')) : 0;
  const offsetMs = zone === undefined || zone === 'Z' ? 0 : parseOffsetMs(zone);
  if (offsetMs === null) return null;

  return Object.freeze({
    iso: text,
    epochMs: date.getTime() - offsetMs + Math.floor(nanos / 1_000_000),
    nanos,
  });
}

function parseOffsetMs(zone: string): number | null {
  const sign = zone.startsWith('-') ? -1 : 1;
  const hours = Number(zone.slice(1, 3));
  const minutes = Number(zone.slice(4, 6));
  if (hours > 23 || minutes > 59) return null;
  return sign * (hours * 60 + minutes) * 60_000;
}
