
// * """"""""""""""""""""""""""""""""""""""""""""""""""""""""" *
// *                                                           *
// *                       4. ASSEMBLER                        *
// *                                                           *
// * """"""""""""""""""""""""""""""""""""""""""""""""""""""""" *


import { toHex, toMinimalBytes } from '../utils';
import { InvalidAssembly } from '../errors';

import { WORD_SIZE } from './1_conventions';
import { Mnemonic, getInstruction, isMnemonic } from './2_opcodes';
import { Program, jumpDestToken, jumpPtrToken, opToken, pushToken, selfCodeSizeToken } from './3_program';


// * ---------------------------
// *  4.1. Expressions.


/** `(op arg1 .. argN)`, N must be the number of stack inputs of `op` */
export interface Form {
  type: 'form';
  op: Mnemonic;
  args: Expression[];
}

/** Jumps to `nonZero` when `cond` is non zero, otherwise runs `zero` */
export interface IfElse {
  type: 'if';
  cond: Expression;
  nonZero: Expression;
  zero: Expression;
}

/** Pushes the size of the whole assembled code */
export interface SelfCodeSize {
  type: 'selfCodeSize';
}

export type Expression =
  | Mnemonic
  | number
  | bigint
  | Uint8Array
  | Expression[]
  | Form
  | IfElse
  | SelfCodeSize;

export function form(op: Mnemonic, ...args: Expression[]): Form {
  return { type: 'form', op, args };
}

/**
 * The `zero` branch is laid out right before the `nonZero` one and nothing jumps over it:
 * unless `zero` halts or jumps by itself, execution falls through into `nonZero`.
 */
export function ifElse(cond: Expression, nonZero: Expression, zero: Expression): IfElse {
  return { type: 'if', cond, nonZero, zero };
}

export const SELF_CODE_SIZE: SelfCodeSize = { type: 'selfCodeSize' };


// * ---------------------------
// *  4.2. Compilation.


/** Hands out jump labels, unique within one `compile` call */
interface LabelAllocator {
  next: number;
}

/**
 * Lowers an expression tree to a flat token sequence.
 * Operands are compiled right to left so that the first operand ends up on top of the stack.
 */
export function compile(expression: Expression): Program {
  return compileExpression(expression, { next: 0 });
}

function compileExpression(expression: Expression, labels: LabelAllocator): Program {
  if (typeof expression === 'string') {
    if (!isMnemonic(expression)) throw new InvalidAssembly(`invalid or unknown assembly: ${describe(expression)}`);
    const instruction = getInstruction(expression);
    if (instruction.pop !== 0) throw new InvalidAssembly(`${expression} expects ${instruction.pop} operand(s), use a form`);
    return [ opToken(expression) ];
  }

  if (typeof expression === 'number') {
    if (!Number.isSafeInteger(expression) || expression < 0) {
      throw new InvalidAssembly(`invalid or unknown assembly: ${describe(expression)}`);
    }
    return compileExpression(BigInt(expression), labels);
  }

  if (typeof expression === 'bigint') {
    if (expression < 0n) throw new InvalidAssembly(`invalid or unknown assembly: ${describe(expression)}`);
    return compileExpression(toMinimalBytes(expression), labels);
  }

  if (expression instanceof Uint8Array) {
    if (expression.length > WORD_SIZE) {
      throw new InvalidAssembly(`binary value larger than 32-bytes \`${toHex(expression)}\``);
    }
    return [ pushToken(expression) ];
  }

  if (Array.isArray(expression)) {
    return expression.flatMap(e => compileExpression(e, labels));
  }

  if (typeof expression === 'object' && expression !== null) {
    switch (expression.type) {
      case 'form': return compileForm(expression, labels);
      case 'if': return compileIfElse(expression, labels);
      case 'selfCodeSize': return [ selfCodeSizeToken ];
    }
  }

  throw new InvalidAssembly(`invalid or unknown assembly: ${describe(expression)}`);
}

function compileForm(expression: Form, labels: LabelAllocator): Program {
  if (!isMnemonic(expression.op)) {
    throw new InvalidAssembly(`invalid or unknown assembly: ${describe(expression.op)}`);
  }
  const instruction = getInstruction(expression.op);
  if (expression.args.length !== instruction.pop) {
    throw new InvalidAssembly(`${instruction.name} expects ${instruction.pop} operand(s), got ${expression.args.length}`);
  }

  const operands = [ ...expression.args ].reverse().flatMap(e => compileExpression(e, labels));
  return [ ...operands, opToken(instruction.name) ];
}

function compileIfElse(expression: IfElse, labels: LabelAllocator): Program {
  const label = labels.next++;

  return [
    ...compileExpression(expression.cond, labels),
    jumpPtrToken(label),
    opToken('JUMPI'),
    ...compileExpression(expression.zero, labels),
    jumpDestToken(label),
    ...compileExpression(expression.nonZero, labels),
  ];
}

function describe(value: unknown): string {
  if (value instanceof Uint8Array) return toHex(value);
  if (typeof value === 'bigint') return `${value}n`;
  if (typeof value === 'string') return `'${value}'`;
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    return String(value);
  }
}
