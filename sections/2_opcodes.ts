
// * """"""""""""""""""""""""""""""""""""""""""""""""""""""""" *
// *                                                           *
// *                      2. OPCODE TABLE                      *
// *                                                           *
// * """"""""""""""""""""""""""""""""""""""""""""""""""""""""" *


// * ---------------------------
// *  2.1. Named Instructions.


// PUSH0..PUSH32 (0x5f-0x7f), DUP1..DUP16 (0x80-0x8f), SWAP1..SWAP16 (0x90-0x9f)
// and INVALID (0xfe) carry their parameter in the opcode byte itself,
// they are represented by dedicated tokens and are not listed here.
export const instructions = {
  // 0s: Stop and Arithmetic Operations
  0x00: { name: 'STOP', pop: 0, push: 0 },
  0x01: { name: 'ADD', pop: 2, push: 1 },
  0x02: { name: 'MUL', pop: 2, push: 1 },
  0x03: { name: 'SUB', pop: 2, push: 1 },
  0x04: { name: 'DIV', pop: 2, push: 1 },
  0x05: { name: 'SDIV', pop: 2, push: 1 },
  0x06: { name: 'MOD', pop: 2, push: 1 },
  0x07: { name: 'SMOD', pop: 2, push: 1 },
  0x08: { name: 'ADDMOD', pop: 3, push: 1 },
  0x09: { name: 'MULMOD', pop: 3, push: 1 },
  0x0a: { name: 'EXP', pop: 2, push: 1 },
  0x0b: { name: 'SIGNEXTEND', pop: 2, push: 1 },
  // 10s: Comparison & Bitwise Logic Operations
  0x10: { name: 'LT', pop: 2, push: 1 },
  0x11: { name: 'GT', pop: 2, push: 1 },
  0x12: { name: 'SLT', pop: 2, push: 1 },
  0x13: { name: 'SGT', pop: 2, push: 1 },
  0x14: { name: 'EQ', pop: 2, push: 1 },
  0x15: { name: 'ISZERO', pop: 1, push: 1 },
  0x16: { name: 'AND', pop: 2, push: 1 },
  0x17: { name: 'OR', pop: 2, push: 1 },
  0x18: { name: 'XOR', pop: 2, push: 1 },
  0x19: { name: 'NOT', pop: 1, push: 1 },
  0x1a: { name: 'BYTE', pop: 2, push: 1 },
  0x1b: { name: 'SHL', pop: 2, push: 1 },
  0x1c: { name: 'SHR', pop: 2, push: 1 },
  0x1d: { name: 'SAR', pop: 2, push: 1 },
  // 20s: SHA3
  0x20: { name: 'SHA3', pop: 2, push: 1 },
  // 30s: Environmental Information
  0x30: { name: 'ADDRESS', pop: 0, push: 1 },
  0x31: { name: 'BALANCE', pop: 1, push: 1 },
  0x32: { name: 'ORIGIN', pop: 0, push: 1 },
  0x33: { name: 'CALLER', pop: 0, push: 1 },
  0x34: { name: 'CALLVALUE', pop: 0, push: 1 },
  0x35: { name: 'CALLDATALOAD', pop: 1, push: 1 },
  0x36: { name: 'CALLDATASIZE', pop: 0, push: 1 },
  0x37: { name: 'CALLDATACOPY', pop: 3, push: 0 },
  0x38: { name: 'CODESIZE', pop: 0, push: 1 },
  0x39: { name: 'CODECOPY', pop: 3, push: 0 },
  0x3a: { name: 'GASPRICE', pop: 0, push: 1 },
  0x3b: { name: 'EXTCODESIZE', pop: 1, push: 1 },
  0x3c: { name: 'EXTCODECOPY', pop: 4, push: 0 },
  0x3d: { name: 'RETURNDATASIZE', pop: 0, push: 1 },
  0x3e: { name: 'RETURNDATACOPY', pop: 3, push: 0 },
  0x3f: { name: 'EXTCODEHASH', pop: 1, push: 1 },
  // 40s: Block Information
  0x40: { name: 'BLOCKHASH', pop: 1, push: 1 },
  0x41: { name: 'COINBASE', pop: 0, push: 1 },
  0x42: { name: 'TIMESTAMP', pop: 0, push: 1 },
  0x43: { name: 'NUMBER', pop: 0, push: 1 },
  0x44: { name: 'PREVRANDAO', pop: 0, push: 1 },
  0x45: { name: 'GASLIMIT', pop: 0, push: 1 },
  0x46: { name: 'CHAINID', pop: 0, push: 1 },
  0x47: { name: 'SELFBALANCE', pop: 0, push: 1 },
  0x48: { name: 'BASEFEE', pop: 0, push: 1 },
  0x49: { name: 'BLOBHASH', pop: 1, push: 1 },
  0x4a: { name: 'BLOBBASEFEE', pop: 0, push: 1 },
  // 50s: Stack, Memory, Storage and Flow Operations
  0x50: { name: 'POP', pop: 1, push: 0 },
  0x51: { name: 'MLOAD', pop: 1, push: 1 },
  0x52: { name: 'MSTORE', pop: 2, push: 0 },
  0x53: { name: 'MSTORE8', pop: 2, push: 0 },
  0x54: { name: 'SLOAD', pop: 1, push: 1 },
  0x55: { name: 'SSTORE', pop: 2, push: 0 },
  0x56: { name: 'JUMP', pop: 1, push: 0 },
  0x57: { name: 'JUMPI', pop: 2, push: 0 },
  0x58: { name: 'PC', pop: 0, push: 1 },
  0x59: { name: 'MSIZE', pop: 0, push: 1 },
  0x5a: { name: 'GAS', pop: 0, push: 1 },
  0x5b: { name: 'JUMPDEST', pop: 0, push: 0 },
  0x5c: { name: 'TLOAD', pop: 1, push: 1 },
  0x5d: { name: 'TSTORE', pop: 2, push: 0 },
  0x5e: { name: 'MCOPY', pop: 3, push: 0 },
  // a0s: Logging Operations
  0xa0: { name: 'LOG0', pop: 2, push: 0 },
  0xa1: { name: 'LOG1', pop: 3, push: 0 },
  0xa2: { name: 'LOG2', pop: 4, push: 0 },
  0xa3: { name: 'LOG3', pop: 5, push: 0 },
  0xa4: { name: 'LOG4', pop: 6, push: 0 },
  // f0s: System Operations
  0xf0: { name: 'CREATE', pop: 3, push: 1 },
  0xf1: { name: 'CALL', pop: 7, push: 1 },
  0xf2: { name: 'CALLCODE', pop: 7, push: 1 },
  0xf3: { name: 'RETURN', pop: 2, push: 0 },
  0xf4: { name: 'DELEGATECALL', pop: 6, push: 1 },
  0xf5: { name: 'CREATE2', pop: 4, push: 1 },
  0xfa: { name: 'STATICCALL', pop: 6, push: 1 },
  0xfd: { name: 'REVERT', pop: 2, push: 0 },
  0xff: { name: 'SELFDESTRUCT', pop: 1, push: 0 },
} as const;

export type Mnemonic = (typeof instructions)[keyof typeof instructions]['name'];

export interface Instruction {
  name: Mnemonic;
  /** byte value */
  code: number;
  /** stack inputs */
  pop: number;
  /** stack outputs */
  push: number;
}

const byName = new Map<Mnemonic, Instruction>();
const byCode = new Map<number, Instruction>();
const mnemonics = new Set<string>();

for (const [code, { name, pop, push }] of Object.entries(instructions)) {
  const instruction: Instruction = { name, code: Number(code), pop, push };
  byName.set(name, instruction);
  byCode.set(instruction.code, instruction);
  mnemonics.add(name);
}

export function isMnemonic(value: unknown): value is Mnemonic {
  return typeof value === 'string' && mnemonics.has(value);
}

export function getInstruction(name: Mnemonic): Instruction {
  const instruction = byName.get(name);
  if (instruction === undefined) throw new Error(`Unknown instruction: ${name}`);
  return instruction;
}

/** byte value of a named instruction */
export function codeOf(name: Mnemonic): number {
  return getInstruction(name).code;
}

export function instructionByCode(code: number): Instruction | undefined {
  return byCode.get(code);
}


// * ---------------------------
// *  2.2. Impure Instructions.


/** Instructions that read or write anything outside of the call input, the code and the machine state */
export const impureInstructions: ReadonlySet<Mnemonic> = new Set<Mnemonic>([
  'ADDRESS', 'BALANCE', 'ORIGIN', 'CALLER', 'GASPRICE', 'EXTCODESIZE', 'EXTCODECOPY',
  'RETURNDATASIZE', 'RETURNDATACOPY', 'EXTCODEHASH',
  'BLOCKHASH', 'COINBASE', 'TIMESTAMP', 'NUMBER', 'PREVRANDAO', 'GASLIMIT', 'CHAINID',
  'SELFBALANCE', 'BASEFEE', 'BLOBHASH', 'BLOBBASEFEE',
  'SLOAD', 'SSTORE', 'GAS',
  'LOG0', 'LOG1', 'LOG2', 'LOG3', 'LOG4',
  'CREATE', 'CALL', 'CALLCODE', 'DELEGATECALL', 'CREATE2', 'STATICCALL', 'SELFDESTRUCT',
]);

export function isImpure(name: Mnemonic) {
  return impureInstructions.has(name);
}
