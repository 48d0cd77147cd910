
import { InvalidAssembly, InvalidOpcode } from '../../errors';
import { invalidToken, jumpDestToken, jumpPtrToken, opToken, pushToken, selfCodeSizeToken } from '../../sections/3_program';
import { resolveJumps } from '../../sections/5_jumps';
import { bytes, push1 } from '../helpers';


describe('Jump resolution', () => {
  test('pointers become 3-byte pushes of the destination offset', () => {
    const program = [
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

    const resolved = resolveJumps(program);
    expect(resolved[6]).toEqual(pushToken(bytes(0, 0, 20)));
    expect(resolved[11]).toEqual(opToken('JUMPDEST'));
    expect(resolved.length).toEqual(program.length);
  });

  test('backward jumps', () => {
    expect(resolveJumps([ jumpDestToken(3), jumpPtrToken(3), opToken('JUMP') ])).toEqual([
      opToken('JUMPDEST'),
      pushToken(bytes(0, 0, 0)),
      opToken('JUMP'),
    ]);
  });

  test('self code size', () => {
    expect(resolveJumps([ selfCodeSizeToken, opToken('STOP') ])).toEqual([
      pushToken(bytes(0, 0, 5)),
      opToken('STOP'),
    ]);
  });

  test('resolved programs are left unchanged', () => {
    const program = [ push1(1), opToken('STOP') ];
    expect(resolveJumps(program)).toEqual(program);
  });

  test('missing destination', () => {
    expect(() => resolveJumps([ jumpPtrToken(4), opToken('JUMP') ])).toThrow(InvalidOpcode);
    expect(() => resolveJumps([ jumpPtrToken(4), opToken('JUMP') ])).toThrow('could not find jump dest: `4`');
  });

  test('destination too far away', () => {
    const program = [ jumpPtrToken(0), invalidToken(new Uint8Array(2 ** 24)), jumpDestToken(0) ];
    expect(() => resolveJumps(program)).toThrow(InvalidAssembly);
  });
});
