// ULID generation with monotonic ordering inside a millisecond.

import { getRandomValues } from 'node:crypto';

const CROCKFORD_BASE32 = '0123456789ABCDEFGHJKMNPQRSTVWXYZ' as const;
const ENCODING_LEN = 32;
const TIME_LEN = 10;
const RANDOM_LEN = 16;
const MAX_TIMESTAMP = 281474976710655;

let lastTimestamp = 0;
let lastRandom: number[] = [];

function encodeTime(timestamp: number): string {
  if (timestamp < 0 || timestamp > MAX_TIMESTAMP) {
    throw new RangeError(`Timestamp must be between 0 and ${MAX_TIMESTAMP}`);
  }
  let result = '';
  let t = timestamp;
  for (let i = TIME_LEN - 1; i >= 0; i--) {
    result = CROCKFORD_BASE32.charAt(t % ENCODING_LEN) + result;
    t = Math.floor(t / ENCODING_LEN);
  }
  return result;
}

function randomChars(): number[] {
  const bytes = getRandomValues(new Uint8Array(RANDOM_LEN));
  return Array.from(bytes, (b) => b % ENCODING_LEN);
}

function incrementRandom(random: readonly number[]): number[] {
  const result = random.slice();
  for (let i = result.length - 1; i >= 0; i--) {
    const next = (result[i] ?? 0) + 1;
    if (next < ENCODING_LEN) {
      result[i] = next;
      return result;
    }
    result[i] = 0;
  }
  throw new Error('ULID random component overflow, retry in the next millisecond');
}

function encodeRandom(chars: readonly number[]): string {
  return chars.map((c) => CROCKFORD_BASE32.charAt(c)).join('');
}

function generateUlid(): string {
  // A clock that moves backwards keeps the last timestamp.
  const now = Math.max(Date.now(), lastTimestamp);

  if (now === lastTimestamp && lastRandom.length === RANDOM_LEN) {
    lastRandom = incrementRandom(lastRandom);
  } else {
    lastTimestamp = now;
    lastRandom = randomChars();
  }

  return encodeTime(now) + encodeRandom(lastRandom);
}

function decodeTime(encoded: string): number {
  if (encoded.length !== TIME_LEN) {
    throw new RangeError(`Time component must be exactly ${TIME_LEN} characters`);
  }
  let timestamp = 0;
  for (const ch of encoded) {
    const idx = CROCKFORD_BASE32.indexOf(ch);
    if (idx === -1) {
      throw new Error(`Invalid Crockford base32 character: ${ch}`);
    }
    timestamp = timestamp * ENCODING_LEN + idx;
  }
  return timestamp;
}

export { generateUlid, encodeTime, decodeTime, CROCKFORD_BASE32 };
