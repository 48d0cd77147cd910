
// * """"""""""""""""""""""""""""""""""""""""""""""""""""""""" *
// *                                                           *
// *                      8. INTERPRETER                       *
// *                                                           *
// * """"""""""""""""""""""""""""""""""""""""""""""""""""""""" *


import { bytesToBigint } from '../utils';

import { Hasher, KEC, MAX_UINT_256, UINT_256_BOUND, WORD_SIZE } from './1_conventions';
import { Mnemonic, isImpure } from './2_opcodes';
import { Program, ResolvedToken, tokenName, tokenSize } from './3_program';
import { resolveJumps } from './5_jumps';
import { decodeLeading } from './6_bytecode';
import {
  Context,
  ExecOptions,
  ExecutionResult,
  Input,
  Result,
  VmError,
  VmFailure,
  VmFault,
  createContext,
  err,
  executionResult,
  fromSigned,
  ok,
  peek,
  pop,
  push,
  readMemory,
  readPadded,
  toMemoryOffset,
  toSigned,
  wordToBytes,
  writeMemory,
} from './7_execution-model';


// * ---------------------------
// *  8.1. Execution Cycle.


/**
 * Runs the instruction at `pc` and returns the next context.
 * The given context is left untouched.
 */
export function step(oldContext: Context, input: Input, options: ExecOptions = {}): Result<Context, VmError> {
  const token = oldContext.opMap.get(oldContext.pc);
  const context: Context = {
    ...oldContext,
    stack: [ ...oldContext.stack ],
    // memory is written in place
    memory: token !== undefined && writesMemory(token) ? oldContext.memory.slice() : oldContext.memory,
  };

  const error = advance(context, input, options);
  return error === undefined ? ok(context) : err(error);
}

/**
 * Executes raw bytecode or a token program until it halts.
 * Token programs may still hold jump placeholders, they are resolved first.
 * Raw bytecode is decoded up to its first undecodable byte, the rest stays readable as data.
 */
export function exec(code: Uint8Array | Program, calldata: Uint8Array = new Uint8Array(), value = 0n, options: ExecOptions = {}): Result<ExecutionResult, VmError> {
  const input: Input = { calldata, value };
  const context = code instanceof Uint8Array
    ? createContext(decodeLeading(code), new Uint8Array(code))
    : createContext(resolveJumps(code));

  // the context is private to this run, every step updates it in place
  while (!context.halted) {
    const error = advance(context, input, options);
    if (error !== undefined) return err(error);
  }

  return ok(executionResult(context));
}

function advance(context: Context, input: Input, options: ExecOptions): VmError | undefined {
  const token = context.opMap.get(context.pc);
  if (token === undefined) return { kind: 'pcOutOfBounds' };

  options.trace?.({
    pc: context.pc,
    opcode: tokenName(token),
    stack: [ ...context.stack ],
    memorySize: context.memory.length,
  });

  try {
    execute(context, token, input, options.hash ?? KEC);
  } catch (e) {
    if (e instanceof VmFault) return e.error;
    throw e;
  }

  // jumps land on a JUMPDEST, so this also steps over the destination
  context.pc += tokenSize(token);
  return undefined;
}

const memoryWriters: ReadonlySet<Mnemonic> = new Set<Mnemonic>([ 'CALLDATACOPY', 'CODECOPY', 'MSTORE', 'MSTORE8', 'MCOPY' ]);

function writesMemory(token: ResolvedToken) {
  return token.type === 'op' && memoryWriters.has(token.op);
}

export type CallOutcome =
  | { status: 'ok'; returnData: Uint8Array }
  | { status: 'revert'; returnData: Uint8Array };

/**
 * Returns the `RETURN` or `REVERT` data of the execution.
 * Throws a `VmFailure` on any other exceptional halt.
 */
export function execCall(code: Uint8Array | Program, calldata: Uint8Array = new Uint8Array(), value = 0n, options: ExecOptions = {}): CallOutcome {
  const result = exec(code, calldata, value, options);
  if (!result.ok) throw new VmFailure(result.error);

  const { reverted, returnData } = result.value;
  return reverted ? { status: 'revert', returnData } : { status: 'ok', returnData };
}


// * ---------------------------
// *  8.2. Instruction Set.


function execute(context: Context, token: ResolvedToken, input: Input, hash: Hasher) {
  switch (token.type) {
    case 'push': {
      if (token.value.length > token.size) {
        throw new VmFault({ kind: 'invalidPush', size: token.size, value: token.value });
      }
      if (token.value.length > WORD_SIZE) throw new VmFault({ kind: 'valueOverflow' });
      push(context, bytesToBigint(token.value));
      return;
    }

    case 'dup':
      push(context, peek(context, token.n - 1));
      return;

    case 'swap': {
      const high = peek(context, token.n);
      const low = peek(context, 0);
      context.stack[token.n] = low;
      context.stack[0] = high;
      return;
    }

    case 'invalid':
      throw new VmFault({ kind: 'invalidOperation' });

    case 'op':
      executeInstruction(context, token.op, input, hash);
      return;
  }
}

function executeInstruction(context: Context, name: Mnemonic, input: Input, hash: Hasher) {
  switch (name) {
    // 0s: Stop and Arithmetic Operations
    case 'STOP': { // 0x00
      context.halted = true;
      return;
    }
    case 'ADD': { // 0x01
      const a = pop(context);
      const b = pop(context);
      push(context, (a + b) % UINT_256_BOUND);
      return;
    }
    case 'MUL': { // 0x02
      const a = pop(context);
      const b = pop(context);
      push(context, (a * b) % UINT_256_BOUND);
      return;
    }
    case 'SUB': { // 0x03
      const a = pop(context);
      const b = pop(context);
      push(context, (UINT_256_BOUND + a - b) % UINT_256_BOUND);
      return;
    }
    case 'DIV': { // 0x04
      const a = pop(context);
      const b = pop(context);
      push(context, b === 0n ? 0n : a / b); // bigint divisions are floored down
      return;
    }
    case 'SDIV': { // 0x05
      const a = toSigned(pop(context));
      const b = toSigned(pop(context));
      push(context, b === 0n ? 0n : fromSigned(a / b)); // truncated toward zero
      return;
    }
    case 'MOD': { // 0x06
      const a = pop(context);
      const b = pop(context);
      push(context, b === 0n ? 0n : a % b);
      return;
    }
    case 'SMOD': { // 0x07
      const a = toSigned(pop(context));
      const b = toSigned(pop(context));
      push(context, b === 0n ? 0n : fromSigned(a % b)); // sign of the dividend
      return;
    }
    case 'ADDMOD': { // 0x08
      const a = pop(context);
      const b = pop(context);
      const n = pop(context);
      push(context, n === 0n ? 0n : (a + b) % n);
      return;
    }
    case 'MULMOD': { // 0x09
      const a = pop(context);
      const b = pop(context);
      const n = pop(context);
      push(context, n === 0n ? 0n : (a * b) % n);
      return;
    }
    case 'EXP': { // 0x0a
      let x = pop(context);
      let e = pop(context);
      let c = 1n;
      while (e > 0n) {
        if (e % 2n === 1n) c = (c * x) % UINT_256_BOUND;
        e = e / 2n;
        x = (x * x) % UINT_256_BOUND;
      }
      push(context, c);
      return;
    }
    case 'SIGNEXTEND': { // 0x0b
      const b = pop(context);
      const x = pop(context);
      if (b >= 31n) {
        push(context, x);
        return;
      }
      const bits = 8n * (b + 1n);
      const lowMask = (1n << bits) - 1n;
      const low = x & lowMask;
      const isNegative = ((x >> (bits - 1n)) & 1n) === 1n;
      push(context, isNegative ? (MAX_UINT_256 ^ lowMask) | low : low);
      return;
    }

    // 10s: Comparison & Bitwise Logic Operations
    case 'LT': { // 0x10
      const a = pop(context);
      const b = pop(context);
      push(context, a < b ? 1n : 0n);
      return;
    }
    case 'GT': { // 0x11
      const a = pop(context);
      const b = pop(context);
      push(context, a > b ? 1n : 0n);
      return;
    }
    case 'SLT': { // 0x12
      const a = toSigned(pop(context));
      const b = toSigned(pop(context));
      push(context, a < b ? 1n : 0n);
      return;
    }
    case 'SGT': { // 0x13
      const a = toSigned(pop(context));
      const b = toSigned(pop(context));
      push(context, a > b ? 1n : 0n);
      return;
    }
    case 'EQ': { // 0x14
      const a = pop(context);
      const b = pop(context);
      push(context, a === b ? 1n : 0n);
      return;
    }
    case 'ISZERO': { // 0x15
      const a = pop(context);
      push(context, a === 0n ? 1n : 0n);
      return;
    }
    case 'AND': { // 0x16
      const a = pop(context);
      const b = pop(context);
      push(context, a & b);
      return;
    }
    case 'OR': { // 0x17
      const a = pop(context);
      const b = pop(context);
      push(context, a | b);
      return;
    }
    case 'XOR': { // 0x18
      const a = pop(context);
      const b = pop(context);
      push(context, a ^ b);
      return;
    }
    case 'NOT': { // 0x19
      const a = pop(context);
      push(context, MAX_UINT_256 ^ a);
      return;
    }
    case 'BYTE': { // 0x1a
      const i = pop(context);
      const x = pop(context);
      push(context, i < 32n ? (x >> (8n * (31n - i))) & 0xffn : 0n);
      return;
    }
    case 'SHL': { // 0x1b
      const shift = capShift(pop(context));
      const value = pop(context);
      push(context, (value << shift) % UINT_256_BOUND);
      return;
    }
    case 'SHR': { // 0x1c
      const shift = capShift(pop(context));
      const value = pop(context);
      push(context, value >> shift);
      return;
    }
    case 'SAR': { // 0x1d
      const shift = capShift(pop(context));
      const value = toSigned(pop(context));
      push(context, fromSigned(value >> shift)); // bigint shifts keep the sign
      return;
    }

    // 20s: SHA3
    case 'SHA3': { // 0x20
      const offset = pop(context);
      const size = pop(context);
      const data = readMemory(context, offset, size);
      push(context, bytesToBigint(hash(data)));
      return;
    }

    // 30s: Call Input and Code
    case 'CALLVALUE': { // 0x34
      push(context, input.value);
      return;
    }
    case 'CALLDATALOAD': { // 0x35
      const i = pop(context);
      push(context, bytesToBigint(readPadded(input.calldata, i, WORD_SIZE)));
      return;
    }
    case 'CALLDATASIZE': { // 0x36
      push(context, BigInt(input.calldata.length));
      return;
    }
    case 'CALLDATACOPY': { // 0x37
      const memOffset = pop(context);
      const dataOffset = pop(context);
      const size = toMemoryOffset(pop(context));
      writeMemory(context, memOffset, readPadded(input.calldata, dataOffset, size));
      return;
    }
    case 'CODESIZE': { // 0x38
      push(context, BigInt(context.encoded.length));
      return;
    }
    case 'CODECOPY': { // 0x39
      const memOffset = pop(context);
      const codeOffset = pop(context);
      const size = toMemoryOffset(pop(context));
      writeMemory(context, memOffset, readPadded(context.encoded, codeOffset, size));
      return;
    }

    // 50s: Stack, Memory and Flow Operations
    case 'POP': { // 0x50
      pop(context);
      return;
    }
    case 'MLOAD': { // 0x51
      const memOffset = pop(context);
      push(context, bytesToBigint(readMemory(context, memOffset, BigInt(WORD_SIZE))));
      return;
    }
    case 'MSTORE': { // 0x52
      const memOffset = pop(context);
      const value = pop(context);
      writeMemory(context, memOffset, wordToBytes(value));
      return;
    }
    case 'MSTORE8': { // 0x53
      const memOffset = pop(context);
      const value = pop(context);
      writeMemory(context, memOffset, new Uint8Array([ Number(value & 0xffn) ]));
      return;
    }
    case 'JUMP': { // 0x56
      const dest = pop(context);
      jumpTo(context, dest);
      return;
    }
    case 'JUMPI': { // 0x57
      const dest = pop(context);
      const cond = pop(context);
      if (cond !== 0n) jumpTo(context, dest);
      return;
    }
    case 'PC': { // 0x58
      push(context, BigInt(context.pc));
      return;
    }
    case 'MSIZE': { // 0x59
      push(context, BigInt(context.memory.length));
      return;
    }
    case 'JUMPDEST': { // 0x5b
      return;
    }
    case 'TLOAD': { // 0x5c
      const key = pop(context);
      push(context, context.transientStorage.get(key) ?? 0n);
      return;
    }
    case 'TSTORE': { // 0x5d
      const key = pop(context);
      const value = pop(context);
      context.transientStorage = new Map(context.transientStorage).set(key, value);
      return;
    }
    case 'MCOPY': { // 0x5e
      const memOffset = pop(context);
      const offset = pop(context);
      const size = pop(context);
      const data = readMemory(context, offset, size);
      writeMemory(context, memOffset, data);
      return;
    }

    // f0s: Halting Operations
    case 'RETURN': { // 0xf3
      const offset = pop(context);
      const size = pop(context);
      context.returnData = readMemory(context, offset, size);
      context.halted = true;
      return;
    }
    case 'REVERT': { // 0xfd
      const offset = pop(context);
      const size = pop(context);
      context.returnData = readMemory(context, offset, size);
      context.halted = true;
      context.reverted = true;
      return;
    }

    default:
      if (isImpure(name)) throw new VmFault({ kind: 'impure', opcode: name });
      throw new VmFault({ kind: 'notImplemented', opcode: name });
  }
}

/** Shift amounts are capped to 255 */
function capShift(shift: bigint): bigint {
  return shift > 255n ? 255n : shift;
}

function jumpTo(context: Context, dest: bigint) {
  const target = dest < BigInt(context.encoded.length) ? context.opMap.get(Number(dest)) : undefined;
  if (target === undefined || target.type !== 'op' || target.op !== 'JUMPDEST') {
    throw new VmFault({ kind: 'invalidJumpDest' });
  }
  context.pc = Number(dest);
}
