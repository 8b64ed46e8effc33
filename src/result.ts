import { DnsCodecError, type DnsCodecErrorCode } from './dns/errors.js';

export type ErrorCode = DnsCodecErrorCode | 'INTERNAL_ERROR';

export type Result<T> = { ok: true; value: T } | { ok: false; code: ErrorCode; message: string };

export function ok<T>(value: T): Result<T> {
  return { ok: true, value };
}

export function err<T = never>(code: ErrorCode, message: string): Result<T> {
  return { ok: false, code, message };
}

export function safeResult<T>(fn: () => T): Result<T> {
  try {
    return ok(fn());
  } catch (e) {
    if (e instanceof DnsCodecError) return err(e.code, e.message);
    const message = e instanceof Error ? e.message : String(e);
    return err('INTERNAL_ERROR', message);
  }
}
