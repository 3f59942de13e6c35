import { HALT_NOTICE, IN_PROMPT, Trap } from './constants/traps';
import { UnknownTrapError } from './errors';
import type { MachineState } from './hardware/machine-state';
import type { MemoryBus } from './hardware/memory';
import { Register } from './hardware/register';
import type { CharacterInput, CharacterOutput } from './io/types';

export type TrapOutcome =
  | { kind: 'continue' }
  | { kind: 'halt' }
  /* R0 is filled in when `pending` settles */
  | { kind: 'input'; pending: Promise<void> };

const CONTINUE: TrapOutcome = { kind: 'continue' };

function toBytes(text: string): number[] {
  return Array.from(text, (c) => c.charCodeAt(0) & 0xff);
}

export class TrapRoutines {
  constructor(
    private readonly state: MachineState,
    private readonly bus: MemoryBus,
    private readonly input: CharacterInput,
    private readonly output: CharacterOutput,
  ) {}

  /**
   * `address` is where the TRAP instruction was fetched from. A character
   * that arrives after `signal` aborts is not stored.
   */
  execute(vector: number, address: number, signal?: AbortSignal): TrapOutcome {
    switch (vector) {
      case Trap.TRAP_GETC: {
        /* read a single ASCII char */
        return this.getChar(signal);
      }
      case Trap.TRAP_OUT: {
        this.output.write([this.state.getRegister(Register.R_R0)]);
        return CONTINUE;
      }
      case Trap.TRAP_PUTS: {
        this.output.write(this.puts(this.state.getRegister(Register.R_R0)));
        return CONTINUE;
      }
      case Trap.TRAP_IN: {
        this.output.write(toBytes(IN_PROMPT));
        return this.getChar(signal);
      }
      case Trap.TRAP_PUTSP: {
        this.output.write(this.putsp(this.state.getRegister(Register.R_R0)));
        return CONTINUE;
      }
      case Trap.TRAP_HALT: {
        this.output.write(toBytes(HALT_NOTICE));
        return { kind: 'halt' };
      }
      default: {
        throw new UnknownTrapError(vector, address);
      }
    }
  }

  private getChar(signal?: AbortSignal): TrapOutcome {
    const char = this.input.read(signal);
    if (typeof char === 'number') {
      this.state.setRegister(Register.R_R0, char & 0xff);
      return CONTINUE;
    }
    return {
      kind: 'input',
      pending: char.then((c) => {
        if (!signal?.aborted) {
          this.state.setRegister(Register.R_R0, c & 0xff);
        }
      }),
    };
  }

  /* one char per word */
  private puts(addr: number): number[] {
    const buf: number[] = [];
    for (let word = this.bus.read(addr); word !== 0; word = this.bus.read(addr)) {
      buf.push(word & 0xff);
      addr++;
    }
    return buf;
  }

  /* two chars per word, low byte first */
  private putsp(addr: number): number[] {
    const buf: number[] = [];
    for (;;) {
      const word = this.bus.read(addr);
      const char1 = word & 0xff;
      if (char1 === 0) {
        break;
      }
      buf.push(char1);

      const char2 = word >> 8;
      if (char2 === 0) {
        break;
      }
      buf.push(char2);
      addr++;
    }
    return buf;
  }
}
