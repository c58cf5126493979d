import { describe, it, expect } from 'vitest';
import { normalize } from './normalize.js';

describe('normalize', () => {
  it('lowercases and strips punctuation', () => {
    expect(normalize('What time do you open?')).toBe('what time do you open');
  });

  it('turns punctuation inside words into spaces', () => {
    expect(normalize("Wi-Fi's password")).toBe('wi fi s password');
  });

  it('collapses whitespace and trims', () => {
    expect(normalize('  hello\t\n  there  ')).toBe('hello there');
  });

  it('trims spaces left behind by trailing punctuation', () => {
    expect(normalize('hours!!!')).toBe('hours');
  });

  it('handles the empty string', () => {
    expect(normalize('')).toBe('');
    expect(normalize('?!.,')).toBe('');
  });

  it('drops non-ascii letters', () => {
    expect(normalize('Café au lait')).toBe('caf au lait');
  });

  it('is idempotent', () => {
    const inputs = ['', 'Hello, World!', '  a  b  ', 'Ünïcode & <tags>', 'ok then', 'x1-y2_z3'];
    for (const input of inputs) {
      const once = normalize(input);
      expect(normalize(once)).toBe(once);
    }
  });
});
