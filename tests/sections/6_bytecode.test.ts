
import { hexStringToBytes, toHex } from '../../utils';
import { InvalidAssembly, InvalidCode, InvalidOpcode } from '../../errors';
import {
  dupToken,
  invalidToken,
  jumpDestToken,
  jumpPtrToken,
  opToken,
  programSize,
  pushToken,
  selfCodeSizeToken,
  swapToken,
} from '../../sections/3_program';
import { form, ifElse } from '../../sections/4_assembler';
import { assemble, build, constructorCode, decode, decodeLeading, disassemble, encode, encodeToken } from '../../sections/6_bytecode';
import { bytes, push1 } from '../helpers';


const jumpProgram = [
  pushToken(bytes(1, 2)),
  push1(0),
  opToken('MSTORE'),
  opToken('CALLVALUE'),
  push1(0),
  opToken('SUB'),
  jumpPtrToken(0),
  opToken('JUMPI'),
  push1(2),
  push1(30),
  opToken('REVERT'),
  jumpDestToken(0),
  push1(2),
  push1(31),
  opToken('REVERT'),
];

describe('Encoding', () => {
  test('single tokens', () => {
    expect(encodeToken(opToken('ADD'))).toEqual(bytes(0x01));
    expect(encodeToken(pushToken(bytes()))).toEqual(bytes(0x5f));
    expect(encodeToken(pushToken(bytes(0xaa, 0xbb)))).toEqual(bytes(0x61, 0xaa, 0xbb));
    expect(encodeToken(dupToken(1))).toEqual(bytes(0x80));
    expect(encodeToken(dupToken(16))).toEqual(bytes(0x8f));
    expect(encodeToken(swapToken(1))).toEqual(bytes(0x90));
    expect(encodeToken(swapToken(16))).toEqual(bytes(0x9f));
    expect(encodeToken(invalidToken(bytes(1, 2)))).toEqual(bytes(0xfe, 1, 2));
  });

  test('assemble pushes of every width', () => {
    const program = [
      pushToken(bytes()),
      pushToken(bytes(0x11, 0x22, 0x33, 0x44)),
      opToken('MSTORE'),
      push1(4),
      push1(28),
      opToken('REVERT'),
    ];
    expect(assemble(program)).toEqual(bytes(95, 99, 17, 34, 51, 68, 82, 96, 4, 96, 28, 253));
  });

  test('assemble with jumps', () => {
    expect(toHex(assemble(jumpProgram))).toEqual('0x6101026000523460000362000014576002601efd5b6002601ffd');
  });

  test('build from expressions', () => {
    expect(toHex(build([ form('LOG1', 0, 0, 55) ]))).toEqual('0x603760006000a1');
    expect(toHex(build([
      form('MSTORE', 0, bytes(0x11, 0x22, 0x33, 0x44)),
      form('REVERT', 28, 4),
    ]))).toEqual('0x63112233446000526004601cfd');
  });

  test('build with jumps', () => {
    const code = build([
      form('MSTORE', 0, 0x01020304),
      ifElse('ORIGIN',
        form('REVERT', 28, 4),
        form('RETURN', 0, 0)),
    ]);
    expect(toHex(code)).toEqual('0x630102030460005232620000135760006000f35b6004601cfd');
  });

  test('encoded length matches the program size', () => {
    const program = [ push1(1), dupToken(2), swapToken(3), invalidToken(bytes(4, 5)) ];
    expect(encode(program).length).toEqual(programSize(program));
  });

  test('malformed tokens', () => {
    expect(() => encodeToken({ type: 'push', size: 2, value: bytes(1) })).toThrow(InvalidAssembly);
    expect(() => encodeToken(pushToken(new Uint8Array(33)))).toThrow(InvalidAssembly);
    expect(() => encodeToken(dupToken(0))).toThrow(InvalidAssembly);
    expect(() => encodeToken(swapToken(17))).toThrow('invalid swap17');
  });

  test('unresolved placeholders', () => {
    expect(() => encodeToken(jumpPtrToken(2))).toThrow(InvalidOpcode);
    expect(() => encodeToken(jumpDestToken(2))).toThrow('unresolved jump label: `2`');
    expect(() => encodeToken(selfCodeSizeToken)).toThrow('unresolved self code size');
    expect(() => encode([ opToken('STOP'), jumpPtrToken(0) ])).toThrow('program still holds jump placeholders, resolve them first');
  });
});

describe('Decoding', () => {
  test('invalid swallows the remaining bytes', () => {
    expect(decode(hexStringToBytes('0x8192fe010203'))).toEqual([
      dupToken(2),
      swapToken(3),
      invalidToken(bytes(1, 2, 3)),
    ]);
    expect(decode(hexStringToBytes('0xfe5b'))).toEqual([ invalidToken(bytes(0x5b)) ]);
  });

  test('jump program', () => {
    expect(decode(hexStringToBytes('0x6101026000523460000362000014576002601efd5b6002601ffd'))).toEqual([
      pushToken(bytes(1, 2)),
      push1(0),
      opToken('MSTORE'),
      opToken('CALLVALUE'),
      push1(0),
      opToken('SUB'),
      pushToken(bytes(0, 0, 0x14)),
      opToken('JUMPI'),
      push1(2),
      push1(30),
      opToken('REVERT'),
      opToken('JUMPDEST'),
      push1(2),
      push1(31),
      opToken('REVERT'),
    ]);
  });

  test('push0 and push32', () => {
    const word = new Uint8Array(32).fill(7);
    expect(decode(bytes(0x5f, 0x7f, ...word))).toEqual([ pushToken(bytes()), pushToken(word) ]);
  });

  test('decoding inverts encoding', () => {
    const program = [
      pushToken(bytes()),
      push1(0x42),
      opToken('SHA3'),
      dupToken(16),
      swapToken(16),
      opToken('JUMPDEST'),
      invalidToken(bytes(0x60)),
    ];
    expect(decode(encode(program))).toEqual(program);
    expect(disassemble(bytes())).toEqual([]);
  });

  test('truncated push', () => {
    expect(() => decode(bytes(0x61, 0x01))).toThrow(InvalidCode);
    expect(() => decode(bytes(0x61, 0x01))).toThrow('insufficient data for push2: `0x6101`');
  });

  test('tokens do not share memory with the input', () => {
    const buffer = Buffer.from([ 0x60, 0x01, 0xfe, 0x02 ]);
    const program = decode(buffer);
    buffer[1] = 9;
    buffer[3] = 9;

    expect(program).toEqual([ push1(1), invalidToken(bytes(2)) ]);
  });

  test('unknown opcode', () => {
    expect(() => decode(bytes(0x00, 0x0c))).toThrow(InvalidOpcode);
    expect(() => decode(bytes(0x00, 0x0c))).toThrow('unknown opcode 0x0c at 1');
  });
});

describe('Leading instructions', () => {
  test('stop at the first byte that is not an instruction', () => {
    expect(decodeLeading(bytes(0x01, 0x0c, 0x01))).toEqual([ opToken('ADD') ]);
    expect(decodeLeading(bytes(0x01, 0x61, 0x01))).toEqual([ opToken('ADD') ]);
    expect(decodeLeading(bytes(0xaa, 0x01))).toEqual([]);
  });

  test('same as decoding when every byte is an instruction', () => {
    const code = hexStringToBytes('0x6101026000523460000362000014576002601efd5b6002601ffd');
    expect(decodeLeading(code)).toEqual(decode(code));
  });
});

describe('Init code', () => {
  test('copies and returns the code that follows it', () => {
    expect(toHex(constructorCode(hexStringToBytes('0xaabbcc')))).toEqual('0x60036200000e60003960036000f3aabbcc');
  });
});
