export type Rgb = readonly [number, number, number];

/** Named colors the destination engine understands, with the RGB value each stands for. */
export const LOGICAL_COLORS: ReadonlyArray<readonly [string, Rgb]> = [
  ['black', [0, 0, 0]],
  ['red', [255, 0, 0]],
  ['darkred', [170, 0, 0]],
  ['brown', [170, 85, 0]],
  ['yellow', [255, 255, 0]],
  ['cyan', [0, 255, 255]],
  ['blue', [0, 0, 255]],
  ['pink', [255, 0, 255]],
  ['purple', [170, 0, 170]],
  ['orange', [252, 127, 0]],
  ['brightorange', [252, 170, 0]],
  ['green', [0, 255, 0]],
  ['brightgreen', [85, 255, 85]],
  ['darkgreen', [0, 128, 0]],
  ['teal', [0, 128, 128]],
  ['gray', [170, 170, 170]],
  ['darkblue', [0, 0, 170]],
  ['white', [255, 255, 255]],
];

const CUBE_LEVELS = [0x00, 0x5f, 0x87, 0xaf, 0xd7, 0xff];

/** Normalizes `#rgb`, `rgb`, `#rrggbb` or `rrggbb` to six lowercase digits; undefined otherwise. */
export function normalizeHex(text: string): string | undefined {
  const hex = text.startsWith('#') ? text.slice(1) : text;
  if (/^[0-9a-fA-F]{6}$/.test(hex)) return hex.toLowerCase();
  if (/^[0-9a-fA-F]{3}$/.test(hex)) {
    return [...hex.toLowerCase()].map((c) => c + c).join('');
  }
  return undefined;
}

export function hexToRgb(hex: string): Rgb {
  const value = parseInt(hex, 16);
  return [(value >> 16) & 0xff, (value >> 8) & 0xff, value & 0xff];
}

function distance(a: Rgb, b: Rgb): number {
  return (a[0] - b[0]) ** 2 + (a[1] - b[1]) ** 2 + (a[2] - b[2]) ** 2;
}

/** Normalized hex → RGB, in order of first mention. */
export type Palette = ReadonlyMap<string, Rgb>;

/** Collects every `#`-prefixed color mentioned in the given style values. */
export function makePalette(values: Iterable<string>): Palette {
  const palette = new Map<string, Rgb>();
  for (const value of values) {
    for (const match of value.matchAll(/#([0-9a-fA-F]+)/g)) {
      const hex = normalizeHex(match[1]);
      if (hex !== undefined && !palette.has(hex)) palette.set(hex, hexToRgb(hex));
    }
  }
  return palette;
}

/** Closest palette color by RGB distance; the earliest wins a tie. */
export function closestColor(target: Rgb, palette: Palette): string | undefined {
  let best: string | undefined;
  let bestDistance = Infinity;
  for (const [hex, rgb] of palette) {
    const d = distance(target, rgb);
    if (d < bestDistance) {
      best = hex;
      bestDistance = d;
    }
  }
  return best;
}

export function xterm256Rgb(index: number): Rgb {
  if (index >= 232) {
    const level = 8 + (index - 232) * 10;
    return [level, level, level];
  }
  const cube = index - 16;
  return [CUBE_LEVELS[Math.floor(cube / 36)], CUBE_LEVELS[Math.floor(cube / 6) % 6], CUBE_LEVELS[cube % 6]];
}

/** Nearest xterm color among the 6x6x6 cube and the grayscale ramp (16 to 255). */
export function rgbTo256(rgb: Rgb): number {
  let best = 16;
  let bestDistance = Infinity;
  for (let index = 16; index <= 255; index++) {
    const d = distance(rgb, xterm256Rgb(index));
    if (d < bestDistance) {
      best = index;
      bestDistance = d;
    }
  }
  return best;
}

export interface ColorTranslators {
  namesToHexes: Map<string, string>;
  /** A palette color chosen by several names keeps the last of them. */
  hexesToNames: Map<string, string>;
  namesToShort: Map<string, number>;
}

export function makeColorTranslators(palette: Palette): ColorTranslators {
  const translators: ColorTranslators = {
    namesToHexes: new Map(),
    hexesToNames: new Map(),
    namesToShort: new Map(),
  };
  for (const [name, rgb] of LOGICAL_COLORS) {
    const hex = closestColor(rgb, palette);
    if (hex === undefined) continue;
    translators.namesToHexes.set(name, hex);
    translators.hexesToNames.set(hex, name);
    translators.namesToShort.set(name, rgbTo256(hexToRgb(hex)));
  }
  return translators;
}
