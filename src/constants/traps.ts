export enum Trap {
  TRAP_GETC = 0x20 /* get character from keyboard, not echoed */,
  TRAP_OUT = 0x21 /* output a character */,
  TRAP_PUTS = 0x22 /* output a word string */,
  TRAP_IN = 0x23 /* prompt, then get character from keyboard */,
  TRAP_PUTSP = 0x24 /* output a byte string */,
  TRAP_HALT = 0x25 /* halt the program */,
}

export const IN_PROMPT = 'Enter a character: ';
export const HALT_NOTICE = 'HALT\n';
