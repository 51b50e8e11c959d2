/**
 * Color bands and their ANSI colors
 */

export type ColorBand = 'ceiling' | 'wallTop' | 'wallMiddle' | 'wallBottom' | 'floor';

export const BAND_COLORS: Record<ColorBand, string> = {
  ceiling: '\x1b[36m',     // cyan
  wallTop: '\x1b[33m',     // yellow
  wallMiddle: '\x1b[37m',  // white
  wallBottom: '\x1b[35m',  // magenta
  floor: '\x1b[32m',       // green
};

export const RESET = '\x1b[0m';
