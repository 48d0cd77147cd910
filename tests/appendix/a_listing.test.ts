
import { dupToken, invalidToken, jumpDestToken, jumpPtrToken, opToken, pushToken, selfCodeSizeToken, swapToken } from '../../sections/3_program';
import { form, compile, ifElse } from '../../sections/4_assembler';
import { build } from '../../sections/6_bytecode';
import { listing, showToken } from '../../appendix/a_listing';
import { bytes } from '../helpers';


describe('Listings', () => {
  test('show tokens', () => {
    expect(showToken(opToken('ADD'))).toEqual('ADD');
    expect(showToken(pushToken(bytes()))).toEqual('PUSH0');
    expect(showToken(pushToken(bytes(1, 2, 3, 4, 5)))).toEqual('PUSH5 0x0102030405');
    expect(showToken(dupToken(2))).toEqual('DUP2');
    expect(showToken(swapToken(16))).toEqual('SWAP16');
    expect(showToken(invalidToken(bytes(1)))).toEqual('INVALID');
    expect(showToken(jumpPtrToken(3))).toEqual('PUSH3 @3');
    expect(showToken(jumpDestToken(3))).toEqual('JUMPDEST @3');
    expect(showToken(selfCodeSizeToken)).toEqual('PUSH3 @size');
  });

  test('bytecode listing', () => {
    expect(listing(build([ form('LOG1', 0, 0, 55) ]))).toEqual([
      '0000    60  PUSH1 0x37',
      '0002    60  PUSH1 0x00',
      '0004    60  PUSH1 0x00',
      '0006    a1  LOG1',
    ].join('\n'));
  });

  test('listing of a program with jump labels', () => {
    expect(listing(compile(ifElse(1, 'STOP', 'CALLVALUE')))).toEqual([
      '0000    60  PUSH1 0x01',
      '0002    62  PUSH3 @0',
      '0006    57  JUMPI',
      '0007    34  CALLVALUE',
      '0008    5b  JUMPDEST @0',
      '0009    00  STOP',
    ].join('\n'));
  });

  test('empty code', () => {
    expect(listing(bytes())).toEqual('');
  });
});
