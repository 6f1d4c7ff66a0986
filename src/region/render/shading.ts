// src/region/render/shading.ts
export type NeighborHeights = Readonly<{
  n: number;
  s: number;
  w: number;
  e: number;
  nw: number;
  ne: number;
  sw: number;
  se: number;
}>;

const VERTICAL_SCALE = 3.0;
const AMBIENT = 0.4;
const DIFFUSE = 0.6;

// Light from the upper left, towards the viewer.
const LIGHT = (() => {
  const len = Math.hypot(-0.2, 0.8, 0.5);
  return { x: -0.2 / len, y: 0.8 / len, z: 0.5 / len };
})();

function lerp(a: number, b: number, t: number): number {
  return a + (b - a) * t;
}

/**
 * Slope lighting multiplier at sub-cell position (u, v) in [0,1]^2.
 *
 * Axis gradients interpolate the W/E and N/S one-sided slopes across the
 * cell; diagonal gradients do the same along NW-SE and NE-SW and are rotated
 * back onto x/z. The axis estimate counts twice.
 */
export function shade(center: number, nb: NeighborHeights, u: number, v: number): number {
  const axisX = lerp(center - nb.w, nb.e - center, u);
  const axisZ = lerp(center - nb.n, nb.s - center, v);

  const ud = (u + v) / 2;
  const vd = (1 - u + v) / 2;
  const diagA = lerp(center - nb.nw, nb.se - center, ud);
  const diagB = lerp(center - nb.ne, nb.sw - center, vd);
  const diagX = (diagA - diagB) / 2;
  const diagZ = (diagA + diagB) / 2;

  const dhdx = axisX * 2 + diagX;
  const dhdz = axisZ * 2 + diagZ;

  const len = Math.hypot(dhdx, VERTICAL_SCALE, dhdz);
  const lambert = Math.max(0, (dhdx * LIGHT.x + VERTICAL_SCALE * LIGHT.y + dhdz * LIGHT.z) / len);

  return AMBIENT + DIFFUSE * lambert;
}

/** Neighbour heights from a 32x32 grid; anything off the grid reads as the centre. */
export function neighborHeights(heights: ReadonlyArray<number>, x: number, z: number): NeighborHeights {
  const center = heights[z * 32 + x] ?? 0;
  const at = (dx: number, dz: number): number => {
    const nx = x + dx;
    const nz = z + dz;
    if (nx < 0 || nx > 31 || nz < 0 || nz > 31) return center;
    return heights[nz * 32 + nx] ?? center;
  };
  return {
    n: at(0, -1),
    s: at(0, 1),
    w: at(-1, 0),
    e: at(1, 0),
    nw: at(-1, -1),
    ne: at(1, -1),
    sw: at(-1, 1),
    se: at(1, 1),
  };
}
