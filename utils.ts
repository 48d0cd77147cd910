
export function bigintToBytes(value: bigint, byteSize: number): Uint8Array {
  const result = new Uint8Array(byteSize);
  for (let i = 0; i < byteSize; i++) {
    result[byteSize - i - 1] = Number((value >> BigInt(8 * i)) & 0xffn);
  }
  return result;
}

export function bytesToBigint(value: Uint8Array): bigint {
  if (value.length === 0) return 0n;
  return BigInt(`0x${bytesToHexString(value)}`);
}

/**
 * Big-endian encoding of a non-negative integer using as few bytes as possible.
 * Zero is encoded as a single zero byte, never as an empty array.
 */
export function toMinimalBytes(value: bigint): Uint8Array {
  if (value < 0n) throw new Error(`Cannot encode negative value: ${value}`);
  let hex = value.toString(16);
  if (hex.length % 2 !== 0) hex = `0${hex}`;
  return hexStringToBytes(hex);
}

export function hexStringToBytes(value: string): Uint8Array {

  // hex string regex with optional prefix `0x`, the payload may be empty
  const isValid = /^(0x)?[0-9a-fA-F]*$/.test(value);
  if (!isValid) throw new Error(`Invalid hex string: ${value}`);

  let v = value;
  if (v.startsWith('0x')) v = v.slice(2);
  if (v.length % 2 !== 0) v = `0${v}`;

  const result = new Uint8Array(v.length / 2);
  for (let i = 0; i < v.length; i += 2) {
    result[i / 2] = parseInt(v.slice(i, i + 2), 16);
  }
  return result;
}

export function bytesToHexString(value: Uint8Array) {
  return [...value].map(x => x.toString(16).padStart(2, '0')).join('');
}

/** `0x` prefixed hex string */
export function toHex(value: Uint8Array) {
  return `0x${bytesToHexString(value)}`;
}

export function concat(...arrays: Uint8Array[]): Uint8Array {
  const size = arrays.reduce((acc, a) => acc + a.length, 0);
  const result = new Uint8Array(size);
  let offset = 0;
  for (const a of arrays) {
    result.set(a, offset);
    offset += a.length;
  }
  return result;
}
