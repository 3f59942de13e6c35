import { MEMORY_SIZE, PC_START } from '../constants/memory';
import { toUint16 } from './bits';
import { ConditionFlag, Register, conditionFor } from './register';

/**
 * Register file and memory of one machine. Every value stored here is an
 * unsigned 16-bit word; writes wrap instead of overflowing.
 */
export class MachineState {
  readonly memory = new Uint16Array(MEMORY_SIZE);
  readonly registers = new Uint16Array(Register.R_COUNT);

  constructor() {
    this.reset();
  }

  reset(): void {
    this.memory.fill(0);
    this.registers.fill(0);
    this.registers[Register.R_PC] = PC_START;
  }

  getRegister(r: Register): number {
    return this.registers[r];
  }

  setRegister(r: Register, value: number): void {
    this.registers[r] = toUint16(value);
  }

  get pc(): number {
    return this.registers[Register.R_PC];
  }

  set pc(value: number) {
    this.registers[Register.R_PC] = toUint16(value);
  }

  /** Zero until the first flag-setting instruction runs. */
  get condition(): number {
    return this.registers[Register.R_COND];
  }

  updateFlags(r: Register): ConditionFlag {
    const flag = conditionFor(this.registers[r]);
    this.registers[Register.R_COND] = flag;
    return flag;
  }

  /** Raw memory read, bypassing memory-mapped devices. */
  peek(address: number): number {
    return this.memory[toUint16(address)];
  }

  poke(address: number, value: number): void {
    this.memory[toUint16(address)] = toUint16(value);
  }
}
