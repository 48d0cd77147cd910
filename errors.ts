
/** A malformed operand, an oversized literal or an unknown assembly form */
export class InvalidAssembly extends Error {
  constructor(message = 'invalid assembly') {
    super(message);
    this.name = 'InvalidAssembly';
  }
}

/** Bytecode that ends in the middle of an instruction */
export class InvalidCode extends Error {
  constructor(message = 'invalid code') {
    super(message);
    this.name = 'InvalidCode';
  }
}

/** An unresolved jump label or a byte matching no known instruction */
export class InvalidOpcode extends Error {
  constructor(message = 'invalid opcode') {
    super(message);
    this.name = 'InvalidOpcode';
  }
}
