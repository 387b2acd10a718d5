import { describe, it, expect } from 'vitest';
import { detectColorSupport, paint, RED } from '../colors.js';

describe('detectColorSupport', () => {
  it('follows the stream when no variable is set', () => {
    expect(detectColorSupport({}, { isTTY: true })).toBe(true);
    expect(detectColorSupport({}, {})).toBe(false);
  });

  it('lets NO_COLOR win over FORCE_COLOR', () => {
    expect(detectColorSupport({ NO_COLOR: '', FORCE_COLOR: '1' }, { isTTY: true })).toBe(false);
    expect(detectColorSupport({ FORCE_COLOR: '1' }, { isTTY: false })).toBe(true);
  });
});

describe('paint', () => {
  it('wraps text only when enabled', () => {
    expect(paint('oops', RED, true)).toBe('\x1b[0;31moops\x1b[0m');
    expect(paint('oops', RED, false)).toBe('oops');
  });
});
