import type { Canvas } from "./canvas.js";
import { rgba } from "./colors.js";

/** Binary PPM (P6), transparent pixels composited over white. */
export function encodePpm(canvas: Canvas): Uint8Array {
  const size = canvas.size;
  const header = new TextEncoder().encode(`P6\n${size} ${size}\n255\n`);
  const pixels = canvas.pixels();
  const out = new Uint8Array(header.length + pixels.length * 3);
  out.set(header, 0);

  let offset = header.length;
  for (const pixel of pixels) {
    const [r, g, b, a] = rgba(pixel);
    out[offset++] = overWhite(r, a);
    out[offset++] = overWhite(g, a);
    out[offset++] = overWhite(b, a);
  }
  return out;
}

function overWhite(channel: number, alpha: number): number {
  return Math.round((channel * alpha + 255 * (255 - alpha)) / 255);
}
