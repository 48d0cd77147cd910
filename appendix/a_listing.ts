
// * """"""""""""""""""""""""""""""""""""""""""""""""""""""""" *
// *                                                           *
// *                 A. DISASSEMBLY LISTINGS                   *
// *                                                           *
// * """"""""""""""""""""""""""""""""""""""""""""""""""""""""" *


import { toHex } from '../utils';

import { limits } from '../sections/1_conventions';
import { codeOf } from '../sections/2_opcodes';
import { Program, Token, tokenName, tokenSize } from '../sections/3_program';
import { PUSH0, decode, encodeToken } from '../sections/6_bytecode';


/** e.g. `ADD`, `PUSH5 0x0102030405`, `DUP2` */
export function showToken(token: Token): string {
  switch (token.type) {
    case 'push': return token.size === 0 ? 'PUSH0' : `${tokenName(token)} ${toHex(token.value)}`;
    case 'jumpPtr':
    case 'jumpDest': return `${tokenName(token)} @${token.label}`;
    case 'selfCodeSize': return `${tokenName(token)} @size`;
    default: return tokenName(token);
  }
}

/**
 * One line per instruction: offset, opcode byte and mnemonic.
 *
 * ```
 * 0000    60  PUSH1 0x37
 * 0002    60  PUSH1 0x00
 * 0004    60  PUSH1 0x00
 * 0006    a1  LOG1
 * ```
 */
export function listing(code: Uint8Array | Program): string {
  const program = code instanceof Uint8Array ? decode(code) : code;

  const lines: string[] = [];
  let pc = 0;
  for (const token of program) {
    lines.push(`${pc.toString(16).padStart(4, '0')}    ${opcodeByte(token)}  ${showToken(token)}`);
    pc += tokenSize(token);
  }
  return lines.join('\n');
}

function opcodeByte(token: Token): string {
  let byte: number;
  switch (token.type) {
    case 'jumpPtr':
    case 'selfCodeSize': byte = PUSH0 + limits.jumpWidth; break;
    case 'jumpDest': byte = codeOf('JUMPDEST'); break;
    default: byte = encodeToken(token)[0];
  }
  return byte.toString(16).padStart(2, '0');
}
