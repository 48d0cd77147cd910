
// * """"""""""""""""""""""""""""""""""""""""""""""""""""""""" *
// *                                                           *
// *                        3. PROGRAMS                        *
// *                                                           *
// * """"""""""""""""""""""""""""""""""""""""""""""""""""""""" *


import { limits } from './1_conventions';
import { Mnemonic } from './2_opcodes';


// * ---------------------------
// *  3.1. Tokens.


/** A zero operand instruction from the opcode table */
export interface OpToken {
  type: 'op';
  op: Mnemonic;
}

/** PUSH0..PUSH32, `size` must equal `value.length` */
export interface PushToken {
  type: 'push';
  size: number;
  value: Uint8Array;
}

/** DUP1..DUP16 */
export interface DupToken {
  type: 'dup';
  n: number;
}

/** SWAP1..SWAP16 */
export interface SwapToken {
  type: 'swap';
  n: number;
}

/** 0xfe followed by raw trailing data */
export interface InvalidToken {
  type: 'invalid';
  data: Uint8Array;
}

/** Placeholder for the offset of the matching `JumpDestToken` */
export interface JumpPtrToken {
  type: 'jumpPtr';
  label: number;
}

/** Placeholder for a labelled `JUMPDEST` */
export interface JumpDestToken {
  type: 'jumpDest';
  label: number;
}

/** Placeholder for the total size of the assembled code */
export interface SelfCodeSizeToken {
  type: 'selfCodeSize';
}

export type ResolvedToken = OpToken | PushToken | DupToken | SwapToken | InvalidToken;
export type PlaceholderToken = JumpPtrToken | JumpDestToken | SelfCodeSizeToken;
export type Token = ResolvedToken | PlaceholderToken;

/** A token sequence, possibly holding placeholders */
export type Program = Token[];

/** A token sequence ready to be encoded */
export type ResolvedProgram = ResolvedToken[];

export function opToken(op: Mnemonic): OpToken {
  return { type: 'op', op };
}

export function pushToken(value: Uint8Array): PushToken {
  return { type: 'push', size: value.length, value };
}

export function dupToken(n: number): DupToken {
  return { type: 'dup', n };
}

export function swapToken(n: number): SwapToken {
  return { type: 'swap', n };
}

export function invalidToken(data: Uint8Array = new Uint8Array()): InvalidToken {
  return { type: 'invalid', data };
}

export function jumpPtrToken(label: number): JumpPtrToken {
  return { type: 'jumpPtr', label };
}

export function jumpDestToken(label: number): JumpDestToken {
  return { type: 'jumpDest', label };
}

export const selfCodeSizeToken: SelfCodeSizeToken = { type: 'selfCodeSize' };

export function isPlaceholder(token: Token): token is PlaceholderToken {
  return token.type === 'jumpPtr' || token.type === 'jumpDest' || token.type === 'selfCodeSize';
}

export function isResolved(program: Program): program is ResolvedProgram {
  return !program.some(isPlaceholder);
}

/** Instruction name as found in disassembly listings, `PUSH2`, `DUP1`, ... */
export function tokenName(token: Token): string {
  switch (token.type) {
    case 'op': return token.op;
    case 'push': return `PUSH${token.size}`;
    case 'dup': return `DUP${token.n}`;
    case 'swap': return `SWAP${token.n}`;
    case 'invalid': return 'INVALID';
    case 'jumpPtr':
    case 'selfCodeSize': return `PUSH${limits.jumpWidth}`;
    case 'jumpDest': return 'JUMPDEST';
  }
}


// * ---------------------------
// *  3.2. Sizes.


/** Number of bytes a token occupies once encoded */
export function tokenSize(token: Token): number {
  switch (token.type) {
    case 'push': return token.size + 1;
    case 'jumpPtr':
    case 'selfCodeSize': return limits.jumpWidth + 1; // a PUSH3
    case 'jumpDest': return 1;
    case 'dup':
    case 'swap': return 1;
    case 'invalid': return 1 + token.data.length;
    case 'op': return 1;
  }
}

export function programSize(program: Program): number {
  return program.reduce((acc, token) => acc + tokenSize(token), 0);
}

/** Starting byte offset of every token */
export function buildOpMap<T extends Token>(program: T[]): Map<number, T> {
  const opMap = new Map<number, T>();
  let pc = 0;
  for (const token of program) {
    opMap.set(pc, token);
    pc += tokenSize(token);
  }
  return opMap;
}
