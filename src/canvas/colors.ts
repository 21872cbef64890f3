/** A pixel colour packed as 0xRRGGBBAA, always non-negative. */
export type Color = number;

export const NAMED_COLORS: ReadonlyMap<string, Color> = new Map([
  ["Red", 0xff0000ff],
  ["Blue", 0x0000ffff],
  ["Green", 0x00ff00ff],
  ["Yellow", 0xffff00ff],
  ["Orange", 0xffa500ff],
  ["Purple", 0xa020f0ff],
  ["Black", 0x000000ff],
  ["White", 0xffffffff],
  ["Transparent", 0xffffff00],
]);

export const WHITE: Color = 0xffffffff;
export const TRANSPARENT: Color = 0xffffff00;

const HEX_COLOR = /^#([0-9a-fA-F]{6}|[0-9a-fA-F]{8})$/;

/**
 * Resolves a colour name from the table (case-sensitive), or a `#RRGGBB` /
 * `#RRGGBBAA` hex string. Returns undefined for anything else.
 */
export function parseColor(text: string): Color | undefined {
  const named = NAMED_COLORS.get(text);
  if (named !== undefined) return named;

  const match = HEX_COLOR.exec(text);
  if (!match) return undefined;
  const digits = match[1].length === 6 ? `${match[1]}ff` : match[1];
  return parseInt(digits, 16) >>> 0;
}

export function colorName(color: Color): string {
  for (const [name, value] of NAMED_COLORS) {
    if (value === color) return name;
  }
  return `#${color.toString(16).padStart(8, "0")}`;
}

export function rgba(color: Color): [number, number, number, number] {
  return [(color >>> 24) & 0xff, (color >>> 16) & 0xff, (color >>> 8) & 0xff, color & 0xff];
}
