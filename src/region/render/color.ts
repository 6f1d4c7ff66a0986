// src/region/render/color.ts
export type Rgb = readonly [number, number, number];

const HEX_COLOR = /^#([0-9a-fA-F]{6})$/;

export function parseHexColor(text: string): Rgb | undefined {
  const m = HEX_COLOR.exec(text.trim());
  if (!m || m[1] === undefined) return undefined;
  const v = parseInt(m[1], 16);
  return [(v >> 16) & 0xff, (v >> 8) & 0xff, v & 0xff];
}

export function clampChannel(v: number): number {
  return Math.max(0, Math.min(255, v));
}
