import { describe, it, expect } from 'vitest';
import { createTexture, createTextureBank, parseTexture, sampleTexture } from './textures';

describe('createTexture', () => {
  it('records the texture size', () => {
    const tex = createTexture(['abc', 'def']);
    expect(tex.width).toBe(3);
    expect(tex.height).toBe(2);
    expect(sampleTexture(tex, 2, 1)).toBe('f');
  });

  it('rejects ragged rows', () => {
    expect(() => createTexture(['abc', 'de'])).toThrow('Texture row 2 has 2 characters, expected 3');
  });

  it('rejects an empty texture', () => {
    expect(() => createTexture([])).toThrow('Texture is empty');
  });
});

describe('parseTexture', () => {
  it('strips color escapes and trailing blank lines', () => {
    const tex = parseTexture([
      '\x1b[38;2;10;20;30m@\x1b[0m\x1b[38;2;1;2;3m#\x1b[0m',
      '..\r',
      '',
    ]);
    expect(tex.rows).toEqual(['@#', '..']);
  });
});

describe('createTextureBank', () => {
  it('provides the default 11x8 wall and seven-step ramps', () => {
    const bank = createTextureBank();
    expect(bank.wall.width).toBe(11);
    expect(bank.wall.height).toBe(8);
    expect(sampleTexture(bank.wall, 0, 0)).toBe('@');
    expect(sampleTexture(bank.wall, 10, 7)).toBe('.');
    expect(bank.ceiling).toBe('.-+*%#@');
    expect(bank.floor).toBe('.-+*%#@');
  });

  it('accepts overrides', () => {
    const wall = createTexture(['xy']);
    const bank = createTextureBank({ wall, floor: ' .' });
    expect(bank.wall).toBe(wall);
    expect(bank.floor).toBe(' .');
    expect(bank.ceiling).toBe('.-+*%#@');
  });

  it('rejects an empty ramp', () => {
    expect(() => createTextureBank({ ceiling: '' })).toThrow('Shading ramps must not be empty');
  });
});
