import { describe, it, expect } from 'vitest';
import { findSum, solveJsonSum } from '@runner/solvers/json-sum';

describe('solveJsonSum', () => {
  it('sums nested objects', () => {
    expect(solveJsonSum('{"a":1,"b":{"c":2,"d":{"e":3}}}')).toBe('6');
  });

  it('answers 0 for an empty object', () => {
    expect(solveJsonSum('{}')).toBe('0');
  });

  it('accepts integer strings, negatives and booleans', () => {
    expect(solveJsonSum('{"a":"10","b":-4,"c":true,"d":false}')).toBe('7');
  });

  it('truncates fractional numbers', () => {
    expect(solveJsonSum('{"a":2.9,"b":-1.5}')).toBe('1');
  });

  it('keeps integer strings beyond 2^53 exact', () => {
    expect(solveJsonSum('{"a":"12345678901234567891","b":1}')).toBe('12345678901234567892');
  });

  it('keeps the total exact once it passes 2^53', () => {
    expect(solveJsonSum('{"a":9007199254740991,"b":2}')).toBe('9007199254740993');
  });

  it('rejects a top level that is not an object', () => {
    expect(() => solveJsonSum('[1,2]')).toThrow('Expected a JSON object');
  });

  it('rejects leaves that are not integers', () => {
    expect(() => solveJsonSum('{"a":"x"}')).toThrow('Value of "a" is not an integer: "x"');
    expect(() => solveJsonSum('{"a":null}')).toThrow('Value of "a" is not an integer: null');
    expect(() => solveJsonSum('{"a":[1]}')).toThrow('Value of "a" is not an integer: [1]');
  });
});

describe('findSum', () => {
  it('works on parsed objects', () => {
    expect(findSum({ x: { y: { z: 40 } }, w: 2 })).toBe(42n);
  });
});
