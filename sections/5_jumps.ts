
// * """"""""""""""""""""""""""""""""""""""""""""""""""""""""" *
// *                                                           *
// *                    5. JUMP RESOLUTION                     *
// *                                                           *
// * """"""""""""""""""""""""""""""""""""""""""""""""""""""""" *


import { bigintToBytes } from '../utils';
import { InvalidAssembly, InvalidOpcode } from '../errors';

import { limits } from './1_conventions';
import { Program, PushToken, ResolvedProgram, ResolvedToken, opToken, pushToken, tokenSize } from './3_program';


/**
 * Assigns a byte offset to every labelled jump destination, then rewrites
 * jump pointers and the self code size placeholder into fixed width pushes.
 */
export function resolveJumps(program: Program): ResolvedProgram {
  // first pass: offsets of jump destinations and of the end of the code
  const jumpMap = new Map<number, number>();
  let endSize = 0;
  for (const token of program) {
    if (token.type === 'jumpDest') jumpMap.set(token.label, endSize);
    endSize += tokenSize(token);
  }

  // second pass: rewrite placeholders
  return program.map((token): ResolvedToken => {
    switch (token.type) {
      case 'jumpPtr': {
        const pc = jumpMap.get(token.label);
        if (pc === undefined) throw new InvalidOpcode(`could not find jump dest: \`${token.label}\``);
        return addressPush(pc);
      }
      case 'jumpDest': return opToken('JUMPDEST');
      case 'selfCodeSize': return addressPush(endSize);
      default: return token;
    }
  });
}

function addressPush(offset: number): PushToken {
  if (offset >= 2 ** (8 * limits.jumpWidth)) {
    throw new InvalidAssembly(`jump too large: ${offset} does not fit in ${limits.jumpWidth} bytes`);
  }
  return pushToken(bigintToBytes(BigInt(offset), limits.jumpWidth));
}
