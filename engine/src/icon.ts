/**
 * Cursor Installer Engine — Placeholder Icon
 *
 * Drawn when none of the remote icon sources answers: a translucent grey
 * disc with a white "C" ring, 128×128 RGBA.
 */

export type PngModule = typeof import("pngjs");

export const PLACEHOLDER_SIZE = 128;

const CENTER = 64;
const DISC_RADIUS = 54;
const RING_INNER = 18;
const RING_OUTER = 30;
/** Half-angle, in degrees, of the gap on the right side of the "C" */
const RING_GAP = 40;

type Rgba = [number, number, number, number];

const TRANSPARENT: Rgba = [0, 0, 0, 0];
const DISC: Rgba = [100, 100, 100, 200];
const LETTER: Rgba = [255, 255, 255, 255];

export function placeholderPixel(x: number, y: number): Rgba {
  const dx = x - CENTER;
  const dy = y - CENTER;
  const distance = Math.sqrt(dx * dx + dy * dy);

  if (distance > DISC_RADIUS) return TRANSPARENT;

  const angle = (Math.atan2(dy, dx) * 180) / Math.PI;
  const inRing = distance >= RING_INNER && distance <= RING_OUTER;
  if (inRing && Math.abs(angle) >= RING_GAP) return LETTER;

  return DISC;
}

export function renderPlaceholderPng(pngjs: PngModule): Buffer {
  const png = new pngjs.PNG({
    width: PLACEHOLDER_SIZE,
    height: PLACEHOLDER_SIZE,
  });

  for (let y = 0; y < PLACEHOLDER_SIZE; y++) {
    for (let x = 0; x < PLACEHOLDER_SIZE; x++) {
      const offset = (y * PLACEHOLDER_SIZE + x) * 4;
      const [r, g, b, a] = placeholderPixel(x, y);
      png.data[offset] = r;
      png.data[offset + 1] = g;
      png.data[offset + 2] = b;
      png.data[offset + 3] = a;
    }
  }

  return pngjs.PNG.sync.write(png);
}
