import { describe, it, expect } from 'vitest';
import { signExtend, toUint16 } from '../bits';
import { ConditionFlag, conditionFor } from '../register';

function twosComplement(field: number, bitCount: number): number {
  return field >= 1 << (bitCount - 1) ? field - (1 << bitCount) : field;
}

describe('signExtend', () => {
  it.each([5, 6, 9, 11])('reproduces the signed value of every %i-bit field', (bitCount) => {
    for (let field = 0; field < 1 << bitCount; field++) {
      expect(signExtend(field, bitCount)).toBe(toUint16(twosComplement(field, bitCount)));
    }
  });

  it('leaves positive fields unchanged', () => {
    expect(signExtend(0x0f, 5)).toBe(0x0f);
    expect(signExtend(0xff, 9)).toBe(0xff);
  });

  it('fills the upper bits of negative fields', () => {
    expect(signExtend(0x10, 5)).toBe(0xfff0);
    expect(signExtend(0x1f, 5)).toBe(0xffff);
    expect(signExtend(0x3e, 6)).toBe(0xfffe);
    expect(signExtend(0x400, 11)).toBe(0xfc00);
  });

  it('ignores bits above the field', () => {
    expect(signExtend(0x1021, 5)).toBe(0x0001);
    expect(signExtend(0x0fff, 9)).toBe(0xffff);
  });
});

describe('toUint16', () => {
  it('wraps past the top of the address space', () => {
    expect(toUint16(0xffff + 1)).toBe(0x0000);
    expect(toUint16(-1)).toBe(0xffff);
  });
});

describe('conditionFor', () => {
  it('reports zero', () => {
    expect(conditionFor(0)).toBe(ConditionFlag.FL_ZRO);
  });

  it('reports negative when bit 15 is set', () => {
    expect(conditionFor(0x8000)).toBe(ConditionFlag.FL_NEG);
    expect(conditionFor(0xffff)).toBe(ConditionFlag.FL_NEG);
  });

  it('reports positive otherwise', () => {
    expect(conditionFor(1)).toBe(ConditionFlag.FL_POS);
    expect(conditionFor(0x7fff)).toBe(ConditionFlag.FL_POS);
  });

  it('always sets exactly one flag', () => {
    for (const value of [0, 1, 0x7fff, 0x8000, 0xffff, 0x1234, 0xabcd]) {
      const flag = conditionFor(value);
      expect([1, 2, 4]).toContain(flag);
    }
  });
});
