
import { bigintToBytes } from '../utils';
import { PushToken, pushToken } from '../sections/3_program';


/** Stack word of a signed or unsigned value */
export function word(value: bigint): bigint {
  return BigInt.asUintN(256, value);
}

/** PUSH32 of a signed or unsigned value */
export function push32(value: bigint): PushToken {
  return pushToken(bigintToBytes(word(value), 32));
}

export function push1(value: number): PushToken {
  return pushToken(new Uint8Array([ value ]));
}

export function bytes(...values: number[]): Uint8Array {
  return new Uint8Array(values);
}
