import { setImmediate as yieldToEventLoop } from 'timers/promises';
import { OpCode } from './constants/opcodes';
import { IOError, UnimplementedOpcodeError, VirtualMachineError, hex } from './errors';
import { signExtend } from './hardware/bits';
import { MachineState } from './hardware/machine-state';
import { MemoryBus } from './hardware/memory';
import { Register } from './hardware/register';
import { type LoadedImage, loadImage, readImage } from './image';
import type { CharacterInput, CharacterOutput } from './io/types';
import { type Logger, silentLogger } from './logger';
import { TrapRoutines } from './traps';

export type StepOutcome =
  | { kind: 'continue' }
  | { kind: 'halt' }
  | { kind: 'input'; pending: Promise<void> }
  | { kind: 'error'; error: VirtualMachineError };

export interface RunResult {
  reason: 'halted' | 'stopped';
  /** Instructions fetched during this run. */
  instructions: number;
}

export interface VirtualMachineOptions {
  input: CharacterInput;
  output: CharacterOutput;
  logger?: Logger;
}

const CONTINUE: StepOutcome = { kind: 'continue' };

/* instructions executed between yields to the event loop */
const YIELD_INTERVAL = 4096;

export class LC3VirtualMachine {
  readonly state = new MachineState();

  private readonly bus: MemoryBus;
  private readonly traps: TrapRoutines;
  private readonly logger: Logger;

  constructor(options: VirtualMachineOptions) {
    this.bus = new MemoryBus(this.state, options.input);
    this.traps = new TrapRoutines(this.state, this.bus, options.input, options.output);
    this.logger = options.logger ?? silentLogger;
  }

  loadImage(image: Uint8Array): LoadedImage {
    return this.logLoaded(loadImage(this.state, image));
  }

  readImage(imagePath: string): LoadedImage {
    this.logger.debug(`Input image: ${imagePath}`);
    return this.logLoaded(readImage(this.state, imagePath));
  }

  /**
   * Runs until HALT or until `signal` aborts. The signal is checked before
   * every fetch, so an instruction is never interrupted half way. Rejects
   * with the machine error that ended the run.
   */
  async run(signal?: AbortSignal): Promise<RunResult> {
    let instructions = 0;

    while (!signal?.aborted) {
      const outcome = this.step(signal);
      instructions++;

      switch (outcome.kind) {
        case 'halt':
          return this.finish('halted', instructions);
        case 'error':
          throw outcome.error;
        case 'input':
          if (!(await this.waitForInput(outcome.pending, signal))) {
            return this.finish('stopped', instructions);
          }
          break;
        case 'continue':
          if (instructions % YIELD_INTERVAL === 0) {
            await yieldToEventLoop();
          }
          break;
      }
    }

    return this.finish('stopped', instructions);
  }

  /**
   * Fetches, decodes and executes one instruction. `signal` cancels a
   * keyboard read the instruction leaves waiting.
   */
  step(signal?: AbortSignal): StepOutcome {
    const address = this.state.pc;
    const instr = this.bus.read(address);
    this.state.pc = address + 1;
    const op = instr >> 12;

    try {
      switch (op) {
        case OpCode.OP_ADD: {
          this.add(instr);
          break;
        }
        case OpCode.OP_AND: {
          this.bitwiseAnd(instr);
          break;
        }
        case OpCode.OP_NOT: {
          this.bitwiseNot(instr);
          break;
        }
        case OpCode.OP_BR: {
          this.branch(instr);
          break;
        }
        case OpCode.OP_JMP: {
          this.jump(instr);
          break;
        }
        case OpCode.OP_JSR: {
          this.jumpRegister(instr);
          break;
        }
        case OpCode.OP_LD: {
          this.load(instr);
          break;
        }
        case OpCode.OP_LDI: {
          this.loadIndirect(instr);
          break;
        }
        case OpCode.OP_LDR: {
          this.loadRegister(instr);
          break;
        }
        case OpCode.OP_LEA: {
          this.loadEffectiveAddress(instr);
          break;
        }
        case OpCode.OP_ST: {
          this.store(instr);
          break;
        }
        case OpCode.OP_STI: {
          this.storeIndirect(instr);
          break;
        }
        case OpCode.OP_STR: {
          this.storeRegister(instr);
          break;
        }
        case OpCode.OP_TRAP: {
          return this.traps.execute(instr & 0xff, address, signal);
        }
        case OpCode.OP_RES:
        case OpCode.OP_RTI:
        default: {
          throw new UnimplementedOpcodeError(op, address);
        }
      }
    } catch (err) {
      if (err instanceof VirtualMachineError) {
        return { kind: 'error', error: err };
      }
      throw err;
    }

    return CONTINUE;
  }

  public add(instr: number) {
    /* destination register (DR) */
    const r0: number = (instr >> 9) & 0x7;
    /* first operand (SR1) */
    const r1: number = (instr >> 6) & 0x7;
    /* whether we are in immediate mode */
    const immFlag: number = (instr >> 5) & 0x1;

    if (immFlag) {
      const imm5: number = signExtend(instr, 5);
      this.state.setRegister(r0, this.state.getRegister(r1) + imm5);
    } else {
      const r2: number = instr & 0x7;
      this.state.setRegister(r0, this.state.getRegister(r1) + this.state.getRegister(r2));
    }

    this.state.updateFlags(r0);
  }

  public bitwiseAnd(instr: number) {
    const r0: number = (instr >> 9) & 0x7;
    const r1: number = (instr >> 6) & 0x7;
    const immFlag: number = (instr >> 5) & 0x1;

    if (immFlag) {
      const imm5: number = signExtend(instr, 5);
      this.state.setRegister(r0, this.state.getRegister(r1) & imm5);
    } else {
      const r2: number = instr & 0x7;
      this.state.setRegister(r0, this.state.getRegister(r1) & this.state.getRegister(r2));
    }

    this.state.updateFlags(r0);
  }

  public bitwiseNot(instr: number) {
    const r0: number = (instr >> 9) & 0x7;
    const r1: number = (instr >> 6) & 0x7;

    this.state.setRegister(r0, ~this.state.getRegister(r1));

    this.state.updateFlags(r0);
  }

  public branch(instr: number) {
    const pcOffset: number = signExtend(instr, 9);
    const condFlag: number = (instr >> 9) & 0x7;
    if (condFlag & this.state.condition) {
      this.state.pc += pcOffset;
    }
  }

  public jump(instr: number) {
    /* also handles RET */
    const r1: number = (instr >> 6) & 0x7;
    this.state.pc = this.state.getRegister(r1);
  }

  public jumpRegister(instr: number) {
    const longFlag: number = (instr >> 11) & 1;
    const returnAddress: number = this.state.pc;
    /* the target is taken before R7 is overwritten, so JSRR R7 works */
    const target: number = longFlag
      ? returnAddress + signExtend(instr, 11) /* JSR */
      : this.state.getRegister((instr >> 6) & 0x7); /* JSRR */

    this.state.setRegister(Register.R_R7, returnAddress);
    this.state.pc = target;
  }

  public load(instr: number) {
    const r0: number = (instr >> 9) & 0x7;
    const pcOffset: number = signExtend(instr, 9);
    this.state.setRegister(r0, this.bus.read(this.state.pc + pcOffset));

    this.state.updateFlags(r0);
  }

  public loadIndirect(instr: number) {
    const r0: number = (instr >> 9) & 0x7;
    const pcOffset: number = signExtend(instr, 9);

    /* add pc_offset to the current PC, look at that memory location to get the final address */
    this.state.setRegister(r0, this.bus.read(this.bus.read(this.state.pc + pcOffset)));

    this.state.updateFlags(r0);
  }

  public loadRegister(instr: number) {
    const r0: number = (instr >> 9) & 0x7;
    const r1: number = (instr >> 6) & 0x7;
    const offset: number = signExtend(instr, 6);
    this.state.setRegister(r0, this.bus.read(this.state.getRegister(r1) + offset));

    this.state.updateFlags(r0);
  }

  public loadEffectiveAddress(instr: number) {
    const r0: number = (instr >> 9) & 0x7;
    const pcOffset: number = signExtend(instr, 9);
    this.state.setRegister(r0, this.state.pc + pcOffset);

    this.state.updateFlags(r0);
  }

  public store(instr: number) {
    const r0: number = (instr >> 9) & 0x7;
    const pcOffset: number = signExtend(instr, 9);
    this.bus.write(this.state.pc + pcOffset, this.state.getRegister(r0));
  }

  public storeIndirect(instr: number) {
    const r0: number = (instr >> 9) & 0x7;
    const pcOffset: number = signExtend(instr, 9);
    this.bus.write(this.bus.read(this.state.pc + pcOffset), this.state.getRegister(r0));
  }

  public storeRegister(instr: number) {
    const r0: number = (instr >> 9) & 0x7;
    const r1: number = (instr >> 6) & 0x7;
    const offset: number = signExtend(instr, 6);
    this.bus.write(this.state.getRegister(r1) + offset, this.state.getRegister(r0));
  }

  /** Resolves false when `signal` aborts before the character arrives. */
  private async waitForInput(pending: Promise<void>, signal?: AbortSignal): Promise<boolean> {
    if (!signal) {
      await this.settleInput(pending);
      return true;
    }
    if (signal.aborted) {
      return false;
    }

    let onAbort = (): void => undefined;
    const aborted = new Promise<false>((resolve) => {
      onAbort = () => resolve(false);
      signal.addEventListener('abort', onAbort, { once: true });
    });
    try {
      return await Promise.race([this.settleInput(pending).then(() => true), aborted]);
    } catch (err) {
      /* a cancelled read rejects */
      if (signal.aborted) {
        return false;
      }
      throw err;
    } finally {
      signal.removeEventListener('abort', onAbort);
    }
  }

  private async settleInput(pending: Promise<void>): Promise<void> {
    try {
      await pending;
    } catch (err) {
      if (err instanceof VirtualMachineError) {
        throw err;
      }
      throw new IOError('keyboard read failed', { cause: err });
    }
  }

  private logLoaded(loaded: LoadedImage): LoadedImage {
    this.logger.debug(`Origin: ${hex(loaded.origin)}, ${loaded.wordCount} words loaded`);
    return loaded;
  }

  private finish(reason: RunResult['reason'], instructions: number): RunResult {
    this.logger.debug(`Run ${reason} after ${instructions} instructions`);
    return { reason, instructions };
  }
}
