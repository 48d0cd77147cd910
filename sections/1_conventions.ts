
// * """"""""""""""""""""""""""""""""""""""""""""""""""""""""" *
// *                                                           *
// *                     1. CONVENTIONS                        *
// *                                                           *
// * """"""""""""""""""""""""""""""""""""""""""""""""""""""""" *


import { keccak256 } from 'ethereum-cryptography/keccak';


/** KEC */
export const KEC: typeof keccak256 = keccak256;

/** Any hash primitive usable by the `SHA3` instruction */
export type Hasher = (data: Uint8Array) => Uint8Array;

/** 2^256 */
export const UINT_256_BOUND = 2n ** 256n;

/** 2^256 - 1 */
export const MAX_UINT_256 = UINT_256_BOUND - 1n;

/** -2^255 */
export const MIN_INT_256 = -(2n ** 255n);

/** 2^255 - 1 */
export const MAX_INT_256 = 2n ** 255n - 1n;

/** Bytes in a word */
export const WORD_SIZE = 32;

export const limits = {
  /** deepest the stack can grow */
  maxStackDepth: 1024,
  /** bytes, memory can never be expanded past this */
  maxMemory: 10_000_000,
  /** byte width of every resolved jump pointer and of the self code size push */
  jumpWidth: 3,
} as const;
