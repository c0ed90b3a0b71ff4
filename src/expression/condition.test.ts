import { describe, expect, it } from 'vitest';
import { MissingVariableError } from '../utils/errors.ts';
import { evaluateCondition, hasCondition } from './condition.ts';

describe('evaluateCondition', () => {
  it('treats the falsy words as false', () => {
    for (const value of ['', 'false', 'FALSE', '0', 'no', 'Off', '  ']) {
      expect(evaluateCondition('{{flag}}', { flag: value })).toBe(false);
    }
  });

  it('treats everything else as true', () => {
    expect(evaluateCondition('{{flag}}', { flag: 'yes' })).toBe(true);
    expect(evaluateCondition('{{flag}}', { flag: true })).toBe(true);
    expect(evaluateCondition('{{count}}', { count: 3 })).toBe(true);
    expect(evaluateCondition('literal', {})).toBe(true);
  });

  it('maps boolean and number values through their text form', () => {
    expect(evaluateCondition('{{flag}}', { flag: false })).toBe(false);
    expect(evaluateCondition('{{count}}', { count: 0 })).toBe(false);
  });

  it('negates with a leading bang', () => {
    expect(evaluateCondition('!{{flag}}', { flag: false })).toBe(true);
    expect(evaluateCondition('! {{flag}}', { flag: 'on' })).toBe(false);
  });

  it('fails when a referenced variable is missing', () => {
    expect(() => evaluateCondition('{{missing}}', {})).toThrow(MissingVariableError);
  });
});

describe('hasCondition', () => {
  it('treats blank strings as absent', () => {
    expect(hasCondition(undefined)).toBe(false);
    expect(hasCondition('   ')).toBe(false);
    expect(hasCondition('{{x}}')).toBe(true);
  });
});
