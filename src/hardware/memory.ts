import { MemoryMappedRegister } from '../constants/memory';
import type { CharacterInput } from '../io/types';
import { toUint16 } from './bits';
import type { MachineState } from './machine-state';

/**
 * Every load and store the machine performs goes through here so that
 * reading the keyboard status register samples the keyboard first.
 */
export class MemoryBus {
  constructor(
    private readonly state: MachineState,
    private readonly keyboard: CharacterInput,
  ) {}

  read(address: number): number {
    address = toUint16(address);
    if (address === MemoryMappedRegister.MR_KBSR) {
      const input = this.keyboard.poll();
      if (input !== undefined) {
        this.state.poke(MemoryMappedRegister.MR_KBSR, 1 << 15);
        this.state.poke(MemoryMappedRegister.MR_KBDR, input);
      } else {
        this.state.poke(MemoryMappedRegister.MR_KBSR, 0x00);
      }
    }
    return this.state.peek(address);
  }

  write(address: number, val: number): void {
    this.state.poke(address, val);
  }
}
