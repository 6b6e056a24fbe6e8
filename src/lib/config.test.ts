import { describe, expect, it } from 'vitest';
import { config, parseBooleanFlag, parseSeed } from './config';

describe('config', () => {
  it('reads boolean flags', () => {
    expect(parseBooleanFlag('true')).toBe(true);
    expect(parseBooleanFlag(' ON ')).toBe(true);
    expect(parseBooleanFlag('1')).toBe(true);
    expect(parseBooleanFlag('false')).toBe(false);
    expect(parseBooleanFlag('')).toBe(false);
  });

  it('reads seeds as integers', () => {
    expect(parseSeed('42')).toBe(42);
    expect(parseSeed('42.9')).toBe(42);
    expect(parseSeed('-3')).toBe(-3);
  });

  it('treats blank or invalid seeds as unset', () => {
    expect(parseSeed('')).toBeNull();
    expect(parseSeed('  ')).toBeNull();
    expect(parseSeed('abc')).toBeNull();
    expect(parseSeed('Infinity')).toBeNull();
  });

  it('exposes the mode flags', () => {
    expect(config.isDev).toBe(!config.isProd);
  });
});
