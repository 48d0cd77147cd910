
// * """"""""""""""""""""""""""""""""""""""""""""""""""""""""" *
// *                                                           *
// *                    7. EXECUTION MODEL                     *
// *                                                           *
// * """"""""""""""""""""""""""""""""""""""""""""""""""""""""" *


import { bigintToBytes, bytesToHexString } from '../utils';

import { Hasher, MAX_INT_256, MIN_INT_256, UINT_256_BOUND, WORD_SIZE, limits } from './1_conventions';
import { Mnemonic } from './2_opcodes';
import { ResolvedProgram, ResolvedToken, buildOpMap } from './3_program';
import { encode } from './6_bytecode';


// * ---------------------------
// *  7.1. Call Input.


export interface Input {
  calldata: Uint8Array;
  /** wei sent along the call */
  value: bigint;
};


// * ---------------------------
// *  7.2. Machine State.


export interface Context {
  code: ResolvedProgram;
  encoded: Uint8Array;
  /** starting byte offset of each instruction */
  opMap: Map<number, ResolvedToken>;
  pc: number;
  halted: boolean;
  /** top of the stack first */
  stack: bigint[];
  memory: Uint8Array;
  transientStorage: Map<bigint, bigint>;
  reverted: boolean;
  returnData: Uint8Array;
};

/** `encoded` defaults to the encoding of `code`, raw bytecode may carry trailing data past it */
export function createContext(code: ResolvedProgram, encoded: Uint8Array = encode(code)): Context {
  return {
    code,
    encoded,
    opMap: buildOpMap(code),
    pc: 0,
    halted: false,
    stack: [],
    memory: new Uint8Array(),
    transientStorage: new Map(),
    reverted: false,
    returnData: new Uint8Array(),
  };
}

export interface ExecutionResult {
  /** top of the stack first */
  stack: bigint[];
  reverted: boolean;
  returnData: Uint8Array;
}

export function executionResult(context: Context): ExecutionResult {
  return {
    stack: context.stack,
    reverted: context.reverted,
    returnData: context.returnData,
  };
}


// * ---------------------------
// *  7.3. Exceptional Halting.


export type VmError =
  | { kind: 'pcOutOfBounds' }
  | { kind: 'stackUnderflow' }
  | { kind: 'stackOverflow' }
  | { kind: 'valueOverflow' }
  | { kind: 'signedIntegerOutOfBounds' }
  | { kind: 'outOfMemory' }
  | { kind: 'invalidOperation' }
  | { kind: 'invalidJumpDest' }
  | { kind: 'invalidPush'; size: number; value: Uint8Array }
  | { kind: 'impure'; opcode: Mnemonic }
  | { kind: 'notImplemented'; opcode: Mnemonic };

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function err<E>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}

export function formatVmError(error: VmError): string {
  switch (error.kind) {
    case 'invalidPush': return `invalidPush(${error.size}, 0x${bytesToHexString(error.value)})`;
    case 'impure':
    case 'notImplemented': return `${error.kind}(${error.opcode})`;
    default: return error.kind;
  }
}

/** Thrown by the machine helpers, never escapes a step */
export class VmFault extends Error {
  constructor(readonly error: VmError) {
    super(formatVmError(error));
    this.name = 'VmFault';
  }
}

/** Any exceptional halt other than a regular `STOP`, `RETURN` or `REVERT` */
export class VmFailure extends Error {
  constructor(readonly error: VmError) {
    super(`VmError: ${formatVmError(error)}`);
    this.name = 'VmFailure';
  }
}


// * ---------------------------
// *  7.4. Stack.


export function pop(context: Context): bigint {
  const value = context.stack.shift();
  if (value === undefined) throw new VmFault({ kind: 'stackUnderflow' });
  return value;
}

/** `n`th item from the top, 0 being the top */
export function peek(context: Context, n: number): bigint {
  if (n >= context.stack.length) throw new VmFault({ kind: 'stackUnderflow' });
  return context.stack[n];
}

export function push(context: Context, value: bigint) {
  if (value < 0n || value >= UINT_256_BOUND) throw new VmFault({ kind: 'valueOverflow' });
  if (context.stack.length >= limits.maxStackDepth) throw new VmFault({ kind: 'stackOverflow' });
  context.stack.unshift(value);
}


// * ---------------------------
// *  7.5. Words.


/** Two's complement reading of a word */
export function toSigned(word: bigint): bigint {
  return BigInt.asIntN(256, word);
}

export function fromSigned(value: bigint): bigint {
  if (value < MIN_INT_256 || value > MAX_INT_256) throw new VmFault({ kind: 'signedIntegerOutOfBounds' });
  return BigInt.asUintN(256, value);
}

export function wordToBytes(word: bigint): Uint8Array {
  return bigintToBytes(word, WORD_SIZE);
}

/** Stack values used as byte counts or offsets into memory */
export function toMemoryOffset(value: bigint): number {
  if (value > BigInt(limits.maxMemory)) throw new VmFault({ kind: 'outOfMemory' });
  return Number(value);
}


// * ---------------------------
// *  7.6. Memory.


/** Zero extends memory to `totalSize` bytes, the returned buffer is never the one passed when it grows */
export function expandMemory(memory: Uint8Array, totalSize: bigint): Uint8Array {
  if (totalSize > BigInt(limits.maxMemory)) throw new VmFault({ kind: 'outOfMemory' });
  const size = Number(totalSize);
  if (memory.length >= size) return memory;
  const expanded = new Uint8Array(size);
  expanded.set(memory);
  return expanded;
}

/** Reads `[offset, offset + size)`, growing memory up to `offset + size` */
export function readMemory(context: Context, offset: bigint, size: bigint): Uint8Array {
  context.memory = expandMemory(context.memory, offset + size);
  return context.memory.slice(Number(offset), Number(offset + size));
}

/** Writes `value` at `offset`, in place unless memory has to grow */
export function writeMemory(context: Context, offset: bigint, value: Uint8Array) {
  context.memory = expandMemory(context.memory, offset + BigInt(value.length));
  context.memory.set(value, Number(offset));
}

/** Reads `size` bytes of `source` from `offset`, bytes past the end read as zero */
export function readPadded(source: Uint8Array, offset: bigint, size: number): Uint8Array {
  const result = new Uint8Array(size);
  if (offset >= BigInt(source.length)) return result;
  const start = Number(offset);
  result.set(source.subarray(start, Math.min(start + size, source.length)));
  return result;
}


// * ---------------------------
// *  7.7. Options.


export interface TraceStep {
  pc: number;
  opcode: string;
  /** top of the stack first */
  stack: bigint[];
  memorySize: number;
}

export interface ExecOptions {
  /** hash used by `SHA3`, keccak-256 by default */
  hash?: Hasher;
  /** called before each instruction */
  trace?: (step: TraceStep) => void;
}
