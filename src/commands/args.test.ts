import { describe, it, expect } from 'vitest';
import { parseArgs, intFlag, requireFlag } from './args.js';

function argv(...args: string[]): string[] {
  return ['node', 'momentum', ...args];
}

describe('args', () => {
  describe('parseArgs', () => {
    it('defaults to help', () => {
      expect(parseArgs(argv())).toEqual({ command: 'help', positionals: [], flags: {} });
    });

    it('separates positionals from value and boolean flags', () => {
      expect(parseArgs(argv('trend', 'acme/rocket', '--window', '5', '--verbose'))).toEqual({
        command: 'trend',
        positionals: ['acme/rocket'],
        flags: { window: '5', verbose: '' },
      });
    });

    it('treats a flag followed by another flag as boolean', () => {
      expect(parseArgs(argv('score', '--force', '--input', 'metrics.json')).flags).toEqual({
        force: '',
        input: 'metrics.json',
      });
    });

    it('joins help topics into the command', () => {
      expect(parseArgs(argv('help', 'score')).command).toBe('help-score');
      expect(parseArgs(argv('help', '--all')).command).toBe('help');
    });
  });

  describe('intFlag', () => {
    it('returns the fallback when absent', () => {
      expect(intFlag({}, 'window', 3)).toBe(3);
    });

    it('parses positive integers', () => {
      expect(intFlag({ window: '5' }, 'window', 3)).toBe(5);
    });

    it('rejects other values', () => {
      expect(() => intFlag({ window: '0' }, 'window', 3)).toThrow(
        '--window must be a positive integer, got "0"'
      );
      expect(() => intFlag({ window: '2.5' }, 'window', 3)).toThrow('--window');
      expect(() => intFlag({ window: '' }, 'window', 3)).toThrow('--window');
    });
  });

  describe('requireFlag', () => {
    it('returns the value', () => {
      expect(requireFlag({ input: 'a.json' }, 'input')).toBe('a.json');
    });

    it('throws when missing or empty', () => {
      expect(() => requireFlag({}, 'input')).toThrow('--input is required');
      expect(() => requireFlag({ input: '' }, 'input')).toThrow('--input is required');
    });
  });
});
