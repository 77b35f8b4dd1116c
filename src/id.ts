import { v4 as uuidv4 } from "uuid";

const BASE62 = "0123456789ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz";
export const ID_LENGTH = 22;

/** Encode 16 bytes as a fixed-width base62 string. */
export function base62Encode(bytes: Uint8Array): string {
  let n = 0n;
  for (const b of bytes) {
    n = (n << 8n) | BigInt(b);
  }
  const chars: string[] = [];
  for (let i = 0; i < ID_LENGTH; i++) {
    chars.push(BASE62[Number(n % 62n)]);
    n /= 62n;
  }
  return chars.reverse().join("");
}

/** Random task/user identifier: a UUIDv4 rendered in base62. */
export function generateId(): string {
  const buf = new Uint8Array(16);
  uuidv4({}, buf);
  return base62Encode(buf);
}
