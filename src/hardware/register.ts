export enum Register {
  R_R0,
  R_R1,
  R_R2,
  R_R3,
  R_R4,
  R_R5,
  R_R6,
  R_R7,
  R_PC /* program counter */,
  R_COND,
  R_COUNT,
}

export enum ConditionFlag {
  FL_POS = 1 << 0 /* P */,
  FL_ZRO = 1 << 1 /* Z */,
  FL_NEG = 1 << 2 /* N */,
}

const SIGN_BIT = 1 << 15;

export function conditionFor(value: number): ConditionFlag {
  if (value === 0) {
    return ConditionFlag.FL_ZRO;
  }
  /* a 1 in the left-most bit indicates negative */
  return value & SIGN_BIT ? ConditionFlag.FL_NEG : ConditionFlag.FL_POS;
}
