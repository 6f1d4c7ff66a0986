// src/region/render/rgbImage.ts
import type { Rgb } from "./color.js";

export type RgbImage = {
  width: number;
  height: number;
  data: Uint8Array; // length = width*height*3 (RGB)
};

export function createImage(width: number, height: number, fill: Rgb = [0, 0, 0]): RgbImage {
  const [r, g, b] = fill;
  const data = new Uint8Array(width * height * 3);
  for (let i = 0; i < width * height; i++) {
    const o = i * 3;
    data[o + 0] = r;
    data[o + 1] = g;
    data[o + 2] = b;
  }
  return { width, height, data };
}

export function setPixel(img: RgbImage, x: number, y: number, c: Rgb): void {
  if (x < 0 || y < 0 || x >= img.width || y >= img.height) {
    throw new Error(`setPixel out of bounds: (${x},${y}) vs ${img.width}x${img.height}`);
  }
  const o = (y * img.width + x) * 3;
  img.data[o + 0] = c[0];
  img.data[o + 1] = c[1];
  img.data[o + 2] = c[2];
}

export function getPixel(img: RgbImage, x: number, y: number): Rgb {
  const o = (y * img.width + x) * 3;
  return [img.data[o + 0] ?? 0, img.data[o + 1] ?? 0, img.data[o + 2] ?? 0];
}

/** Copy src into dst at (dx,dy), clipped to dst. */
export function blit(dst: RgbImage, src: RgbImage, dx: number, dy: number): void {
  const x0 = Math.max(0, dx);
  const y0 = Math.max(0, dy);
  const x1 = Math.min(dst.width, dx + src.width);
  const y1 = Math.min(dst.height, dy + src.height);

  if (x1 <= x0 || y1 <= y0) return;

  for (let y = y0; y < y1; y++) {
    const srcStart = ((y - dy) * src.width + (x0 - dx)) * 3;
    const srcEnd = srcStart + (x1 - x0) * 3;
    dst.data.set(src.data.subarray(srcStart, srcEnd), (y * dst.width + x0) * 3);
  }
}
