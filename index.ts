
export * from './utils';
export * from './errors';

export * from './sections/1_conventions';
export * from './sections/2_opcodes';
export * from './sections/3_program';
export * from './sections/4_assembler';
export * from './sections/5_jumps';
export * from './sections/6_bytecode';
export * from './sections/7_execution-model';
export * from './sections/8_interpreter';

export * from './appendix/a_listing';
