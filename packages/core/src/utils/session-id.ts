import { SessionId } from "../types/session";

const SESSION_KEY = /^(\d{1,3})-(\d{4})-(\d{1,4})$/;

const pad = (value: number, width: number) =>
  value.toString().padStart(width, "0");

/** `38-2015-001`: term, year and running number. */
export function formatSessionKey(session: SessionId): string {
  return `${pad(session.term, 2)}-${session.year}-${pad(session.number, 3)}`;
}

export function parseSessionKey(key: string): SessionId {
  const match = SESSION_KEY.exec(key.trim());
  if (!match) {
    throw new Error(
      `Invalid session key "${key}", expected <term>-<year>-<number>`
    );
  }
  return {
    term: Number.parseInt(match[1], 10),
    year: Number.parseInt(match[2], 10),
    number: Number.parseInt(match[3], 10),
  };
}

export function isSameSession(left: SessionId, right: SessionId): boolean {
  return (
    left.term === right.term &&
    left.year === right.year &&
    left.number === right.number
  );
}

/**
 * Fill `{session}`, `{term}`, `{year}`, `{number}` and any extra
 * placeholders in a path template. `{number}` is padded to three digits.
 */
export function fillSessionTemplate(
  template: string,
  session: SessionId,
  extra: Record<string, string> = {}
): string {
  const values: Record<string, string> = {
    ...extra,
    session: formatSessionKey(session),
    term: pad(session.term, 2),
    year: session.year.toString(),
    number: pad(session.number, 3),
  };
  return template.replace(/\{(\w+)\}/g, (placeholder, name: string) =>
    name in values ? values[name] : placeholder
  );
}

/** Centiseconds padded to eight digits, as in utterance ids. */
export function formatOffset(centiseconds: number): string {
  return pad(centiseconds, 8);
}

export function formatUtteranceId(
  session: SessionId,
  start: number,
  end: number
): string {
  return `${formatSessionKey(session)}-${formatOffset(start)}-${formatOffset(end)}`;
}

/** `120` -> `1.20` without going through floating point. */
export function formatSeconds(centiseconds: number): string {
  const whole = Math.floor(centiseconds / 100);
  return `${whole}.${pad(centiseconds % 100, 2)}`;
}

export function parseSeconds(value: string): number {
  const match = /^(\d+)(?:\.(\d{1,2}))?$/.exec(value.trim());
  if (match) {
    const fraction = (match[2] ?? "0").padEnd(2, "0");
    return Number.parseInt(match[1], 10) * 100 + Number.parseInt(fraction, 10);
  }
  const parsed = Number.parseFloat(value);
  if (Number.isNaN(parsed)) {
    throw new Error(`Invalid time value "${value}"`);
  }
  return Math.round(parsed * 100);
}
