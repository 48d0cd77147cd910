
// * """"""""""""""""""""""""""""""""""""""""""""""""""""""""" *
// *                                                           *
// *                        6. BYTECODE                        *
// *                                                           *
// * """"""""""""""""""""""""""""""""""""""""""""""""""""""""" *


import { bytesToHexString, concat, toHex } from '../utils';
import { InvalidAssembly, InvalidCode, InvalidOpcode } from '../errors';

import { WORD_SIZE } from './1_conventions';
import { codeOf, instructionByCode } from './2_opcodes';
import { Program, ResolvedProgram, Token, dupToken, invalidToken, isResolved, opToken, pushToken, swapToken } from './3_program';
import { Expression, SELF_CODE_SIZE, compile, form } from './4_assembler';
import { resolveJumps } from './5_jumps';


export const PUSH0 = 0x5f;
export const DUP1 = 0x80;
export const SWAP1 = 0x90;
export const INVALID = 0xfe;


// * ---------------------------
// *  6.1. Encoding.


export function encodeToken(token: Token): Uint8Array {
  switch (token.type) {
    case 'push':
      if (token.size !== token.value.length || token.size > WORD_SIZE) {
        throw new InvalidAssembly(`invalid push${token.size}: \`${toHex(token.value)}\``);
      }
      return concat(new Uint8Array([ PUSH0 + token.size ]), token.value);
    case 'dup':
      if (!isStackIndex(token.n)) throw new InvalidAssembly(`invalid dup${token.n}`);
      return new Uint8Array([ DUP1 - 1 + token.n ]);
    case 'swap':
      if (!isStackIndex(token.n)) throw new InvalidAssembly(`invalid swap${token.n}`);
      return new Uint8Array([ SWAP1 - 1 + token.n ]);
    case 'invalid':
      return concat(new Uint8Array([ INVALID ]), token.data);
    case 'op':
      return new Uint8Array([ codeOf(token.op) ]);
    case 'jumpPtr':
    case 'jumpDest':
      throw new InvalidOpcode(`unresolved jump label: \`${token.label}\``);
    case 'selfCodeSize':
      throw new InvalidOpcode('unresolved self code size');
  }
}

function isStackIndex(n: number) {
  return Number.isInteger(n) && n >= 1 && n <= 16;
}

/** Raw bytecode of a program whose jumps are already resolved */
export function encode(program: Program): Uint8Array {
  if (!isResolved(program)) throw new InvalidOpcode('program still holds jump placeholders, resolve them first');
  return concat(...program.map(encodeToken));
}

/** Resolves jumps then encodes */
export function assemble(program: Program): Uint8Array {
  return encode(resolveJumps(program));
}

/** Compiles then assembles */
export function build(expression: Expression): Uint8Array {
  return assemble(compile(expression));
}


// * ---------------------------
// *  6.2. Decoding.


/** Inverse of `encode`, jump labels are not recovered */
export function decode(bytes: Uint8Array): ResolvedProgram {
  return decodeTokens(bytes, true);
}

/**
 * Decodes up to the first byte that does not start a complete instruction.
 * Whatever follows is left as raw data, reachable only through `CODECOPY`.
 */
export function decodeLeading(bytes: Uint8Array): ResolvedProgram {
  return decodeTokens(bytes, false);
}

function decodeTokens(bytes: Uint8Array, strict: boolean): ResolvedProgram {
  const program: ResolvedProgram = [];
  let i = 0;

  while (i < bytes.length) {
    const x = bytes[i];

    if (x >= PUSH0 && x < DUP1) {
      const n = x - PUSH0;
      if (i + 1 + n > bytes.length) {
        if (!strict) break;
        throw new InvalidCode(`insufficient data for push${n}: \`0x${bytesToHexString(bytes.subarray(i))}\``);
      }
      program.push(pushToken(copyBytes(bytes, i + 1, i + 1 + n)));
      i += 1 + n;

    } else if (x >= DUP1 && x < SWAP1) {
      program.push(dupToken(x - DUP1 + 1));
      i++;

    } else if (x >= SWAP1 && x < SWAP1 + 16) {
      program.push(swapToken(x - SWAP1 + 1));
      i++;

    } else if (x === INVALID) {
      // everything after 0xfe is raw data
      program.push(invalidToken(copyBytes(bytes, i + 1, bytes.length)));
      break;

    } else {
      const instruction = instructionByCode(x);
      if (instruction === undefined) {
        if (!strict) break;
        throw new InvalidOpcode(`unknown opcode 0x${x.toString(16).padStart(2, '0')} at ${i}`);
      }
      program.push(opToken(instruction.name));
      i++;
    }
  }

  return program;
}

/** `Buffer#slice` is a view, tokens never share memory with the input */
function copyBytes(bytes: Uint8Array, start: number, end: number): Uint8Array {
  return new Uint8Array(bytes.subarray(start, end));
}

export const disassemble = decode;


// * ---------------------------
// *  6.3. Init Code.


/** Init code that copies `code` into memory and returns it */
export function constructorCode(code: Uint8Array): Uint8Array {
  const preamble = build([
    form('CODECOPY', 0, SELF_CODE_SIZE, code.length),
    form('RETURN', 0, code.length),
  ]);
  return concat(preamble, code);
}
