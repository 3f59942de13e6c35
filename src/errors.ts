export class VirtualMachineError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The program image could not be opened or placed in memory. */
export class LoadError extends VirtualMachineError {}

export class UnimplementedOpcodeError extends VirtualMachineError {
  constructor(
    readonly opcode: number,
    readonly address: number,
  ) {
    super(`unimplemented opcode ${hex(opcode, 1)} at ${hex(address)}`);
  }
}

export class UnknownTrapError extends VirtualMachineError {
  constructor(
    readonly vector: number,
    readonly address: number,
  ) {
    super(`unknown trap vector ${hex(vector, 2)} at ${hex(address)}`);
  }
}

/** Reading from the keyboard failed; there is no recovery path. */
export class IOError extends VirtualMachineError {}

export function hex(value: number, digits = 4): string {
  return 'x' + value.toString(16).toUpperCase().padStart(digits, '0');
}
