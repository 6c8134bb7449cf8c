import { Buffer } from 'node:buffer';
import { timingSafeEqual } from 'node:crypto';

function padBuffer(buffer: Buffer, length: number): Buffer {
  const padded = Buffer.alloc(length);
  buffer.copy(padded);
  return padded;
}

export function timingSafeEqualUtf8(a: string, b: string): boolean {
  const aBuffer = Buffer.from(a, 'utf8');
  const bBuffer = Buffer.from(b, 'utf8');
  if (aBuffer.length === bBuffer.length) {
    return timingSafeEqual(aBuffer, bBuffer);
  }

  // Avoid early return timing differences on length mismatch.
  const maxLength = Math.max(aBuffer.length, bBuffer.length);
  const paddedA = padBuffer(aBuffer, maxLength);
  const paddedB = padBuffer(bBuffer, maxLength);

  return timingSafeEqual(paddedA, paddedB) && aBuffer.length === bBuffer.length;
}

/**
 * Short, non-identifying hint for logs: at most four leading characters and
 * never more than a quarter of the token.
 */
export function describeToken(token: string): string {
  if (!token) return '<empty>';
  const visible = Math.min(4, Math.floor(token.length / 4));
  return `${token.slice(0, visible)}…(${token.length} chars)`;
}
