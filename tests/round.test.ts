import { describe, it, expect } from 'vitest';
import { formatDecimal, roundHalfEven } from '../src/round';

describe('roundHalfEven', () => {
  it('sends exact ties to the even neighbour', () => {
    expect(roundHalfEven(0.125)).toBe(0.12);
    expect(roundHalfEven(0.375)).toBe(0.38);
    expect(roundHalfEven(-0.125)).toBe(-0.12);
    expect(roundHalfEven(0.25, 1)).toBe(0.2);
  });

  it('rounds non-ties by their binary value', () => {
    expect(roundHalfEven(2.675)).toBe(2.67);
    expect(roundHalfEven(1 / 3)).toBe(0.33);
    expect(roundHalfEven(2 / 3)).toBe(0.67);
    expect(roundHalfEven(1)).toBe(1);
  });
});

describe('formatDecimal', () => {
  it('keeps one decimal on whole numbers', () => {
    expect(formatDecimal(1)).toBe('1.0');
    expect(formatDecimal(0)).toBe('0.0');
    expect(formatDecimal(0.5)).toBe('0.5');
    expect(formatDecimal(-0.33)).toBe('-0.33');
  });
});
