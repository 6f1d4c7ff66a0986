// src/region/render/png.ts
import * as pngjs from "pngjs";
import type { RgbImage } from "./rgbImage.js";

const { PNG } = pngjs;

/** Encode as an opaque RGBA PNG. */
export function writePngRgb(img: RgbImage): Buffer {
  const png = new PNG({ width: img.width, height: img.height });
  const rgba = Buffer.alloc(img.width * img.height * 4);
  for (let i = 0; i < img.width * img.height; i++) {
    rgba[i * 4 + 0] = img.data[i * 3 + 0] ?? 0;
    rgba[i * 4 + 1] = img.data[i * 3 + 1] ?? 0;
    rgba[i * 4 + 2] = img.data[i * 3 + 2] ?? 0;
    rgba[i * 4 + 3] = 255;
  }
  png.data = rgba;
  return PNG.sync.write(png);
}
