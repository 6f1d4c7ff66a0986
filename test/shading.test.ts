import { describe, expect, it } from "vitest";

import { neighborHeights, shade, type NeighborHeights } from "../src/region/render/shading.js";

function flat(h: number): NeighborHeights {
  return { n: h, s: h, w: h, e: h, nw: h, ne: h, sw: h, se: h };
}

// 0.4 + 0.6 * (light.y component of the normalised light vector)
const FLAT = 0.4 + (0.6 * 0.8) / Math.hypot(-0.2, 0.8, 0.5);

describe("shade", () => {
  it("gives the same multiplier everywhere on flat ground", () => {
    for (const [u, v] of [
      [0.5, 0.5],
      [0, 0],
      [1, 1],
      [0.25, 0.75],
    ] as const) {
      expect(shade(10, flat(10), u, v)).toBeCloseTo(FLAT, 10);
    }
    expect(FLAT).toBeCloseTo(0.8977, 4);
  });

  it("darkens slopes rising towards the east and lightens slopes rising towards the west", () => {
    const east = shade(10, { ...flat(10), e: 12 }, 0.5, 0.5);
    const west = shade(10, { ...flat(10), w: 12 }, 0.5, 0.5);
    expect(east).toBeCloseTo(0.7451, 3);
    expect(west).toBeCloseTo(0.8832, 3);
    expect(east).toBeLessThan(FLAT);
  });

  it("never drops below the ambient term", () => {
    expect(shade(10, { ...flat(10), e: 100 }, 1, 0.5)).toBe(0.4);
  });

  it("interpolates one-sided slopes across the cell", () => {
    const nb = { ...flat(10), e: 20 };
    expect(shade(10, nb, 0, 0.5)).toBeCloseTo(FLAT, 10);
    expect(shade(10, nb, 1, 0.5)).toBeLessThan(shade(10, nb, 0.5, 0.5));
  });
});

describe("neighborHeights", () => {
  const grid = Array.from({ length: 1024 }, (_, i) => (i % 32) + Math.floor(i / 32) * 100);

  it("reads the eight surrounding columns", () => {
    expect(neighborHeights(grid, 5, 5)).toEqual({
      n: 405,
      s: 605,
      w: 504,
      e: 506,
      nw: 404,
      ne: 406,
      sw: 604,
      se: 606,
    });
  });

  it("uses the centre height off the grid", () => {
    expect(neighborHeights(grid, 0, 0)).toEqual({ n: 0, s: 100, w: 0, e: 1, nw: 0, ne: 0, sw: 0, se: 101 });
    expect(neighborHeights(grid, 31, 31)).toEqual({
      n: 3031,
      s: 3131,
      w: 3130,
      e: 3131,
      nw: 3030,
      ne: 3131,
      sw: 3131,
      se: 3131,
    });
  });
});
