import type { FileHandle } from "node:fs/promises";

/** An unsigned 64-bit LEB128 value never spans more than ten bytes. */
export const MAX_VARINT_BYTES = 10;

export interface DecodedVarint {
  readonly value: number;
  /** Number of bytes the encoding occupied. */
  readonly length: number;
}

/**
 * Decodes an unsigned varint (little-endian groups of 7 bits, high bit set on
 * every byte but the last) from the start of `bytes`. Returns `null` when the
 * buffer ends before the terminating byte, when the encoding is longer than
 * {@link MAX_VARINT_BYTES}, or when the value exceeds
 * `Number.MAX_SAFE_INTEGER`.
 */
export function decodeVarint(bytes: Uint8Array): DecodedVarint | null {
  let value = 0n;
  let shift = 0n;
  const limit = Math.min(bytes.length, MAX_VARINT_BYTES);
  for (let index = 0; index < limit; index += 1) {
    const byte = bytes[index] ?? 0;
    value |= BigInt(byte & 0x7f) << shift;
    if (byte < 0x80) {
      if (value > BigInt(Number.MAX_SAFE_INTEGER)) {
        return null;
      }
      return { value: Number(value), length: index + 1 };
    }
    shift += 7n;
  }
  return null;
}

export function encodeVarint(value: number): Uint8Array {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new RangeError(`varint value must be a non-negative safe integer, received ${value}`);
  }
  const bytes: number[] = [];
  let remaining = BigInt(value);
  do {
    let byte = Number(remaining & 0x7fn);
    remaining >>= 7n;
    if (remaining > 0n) {
      byte |= 0x80;
    }
    bytes.push(byte);
  } while (remaining > 0n);
  return Uint8Array.from(bytes);
}

/**
 * Reads a varint at `position` with a single positional read of at most
 * {@link MAX_VARINT_BYTES} bytes. Past the end of the file the read returns
 * fewer bytes and the decode yields `null`.
 */
export async function readVarintAt(handle: FileHandle, position: number): Promise<DecodedVarint | null> {
  const buffer = new Uint8Array(MAX_VARINT_BYTES);
  const { bytesRead } = await handle.read(buffer, 0, MAX_VARINT_BYTES, position);
  return decodeVarint(buffer.subarray(0, bytesRead));
}
