import sharp from 'sharp';
import type { BoundingBox, Detection, ImageFetcher } from '../../src/types.js';

export interface Rgb {
  r: number;
  g: number;
  b: number;
}

export function solidPng(size: number, colour: Rgb): Promise<Buffer> {
  return sharp({ create: { width: size, height: size, channels: 3, background: colour } }).png().toBuffer();
}

/** Raw RGB raster of `size` x `size` filled with one colour. */
export function solidRaw(size: number, colour: Rgb): Buffer {
  const out = Buffer.alloc(size * size * 3);
  for (let i = 0; i < out.length; i += 3) {
    out[i] = colour.r;
    out[i + 1] = colour.g;
    out[i + 2] = colour.b;
  }
  return out;
}

/** A box well inside 3x3 tile `tile` (100px cells). */
export function boxInTile(tile: number): BoundingBox {
  const row = Math.floor((tile - 1) / 3);
  const col = (tile - 1) % 3;
  return [col * 100 + 10, row * 100 + 10, col * 100 + 90, row * 100 + 90];
}

export function detectionsIn(classId: number, tiles: number[]): Detection[] {
  return tiles.map((tile) => ({ classId, box: boxInTile(tile) }));
}

/**
 * Serves solid-colour PNGs: full challenge images for URLs containing "full",
 * single tiles otherwise, and undecodable bytes for URLs containing "broken".
 */
export class FakeImageFetcher implements ImageFetcher {
  readonly requested: string[] = [];
  /** Number of upcoming requests that fail as if the image were not served yet. */
  failNext = 0;

  constructor(private readonly fullSize = 300) {}

  async fetch(url: string): Promise<Buffer> {
    this.requested.push(url);
    if (this.failNext > 0) {
      this.failNext--;
      throw new Error(`not ready: ${url}`);
    }
    if (url.includes('broken')) return Buffer.from('not an image');
    if (url.includes('full')) return solidPng(this.fullSize, { r: 40, g: 80, b: 120 });
    return solidPng(100, { r: 200, g: 30, b: 60 });
  }
}
