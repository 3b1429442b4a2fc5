import sharp from 'sharp';
import { CANVAS_SIZE } from './grid.js';
import type { GridSize } from './types.js';

export const CHANNELS = 3;

export interface TileRect {
  left: number;
  top: number;
  width: number;
  height: number;
}

/**
 * The working image for one challenge: a square raw RGB raster that the
 * detector re-reads after replacement tiles are pasted in.
 */
export class Canvas {
  private constructor(
    readonly gridSize: GridSize,
    readonly size: number,
    private readonly pixels: Buffer,
  ) {}

  static blank(gridSize: GridSize): Canvas {
    const size = CANVAS_SIZE[gridSize];
    return new Canvas(gridSize, size, Buffer.alloc(size * size * CHANNELS));
  }

  /** Decode a full challenge image and scale it to the grid's canvas size. */
  static async fromImage(bytes: Buffer, gridSize: GridSize): Promise<Canvas> {
    const size = CANVAS_SIZE[gridSize];
    const pixels = await decodeRgb(bytes, size);
    return new Canvas(gridSize, size, pixels);
  }

  get tileSize(): number {
    return this.size / this.gridSize;
  }

  tileRect(index: number): TileRect {
    const cells = this.gridSize * this.gridSize;
    if (!Number.isInteger(index) || index < 1 || index > cells) {
      throw new RangeError(`Tile ${index} is outside a ${this.gridSize}x${this.gridSize} grid`);
    }
    const tile = this.tileSize;
    if (!Number.isInteger(tile)) {
      throw new RangeError(`A ${this.size}px canvas has no whole-pixel ${this.gridSize}x${this.gridSize} tiles`);
    }
    const row = Math.floor((index - 1) / this.gridSize);
    const col = (index - 1) % this.gridSize;
    return { left: col * tile, top: row * tile, width: tile, height: tile };
  }

  /** Overwrite one tile with a raw RGB raster of exactly tileSize x tileSize. */
  paste(index: number, tile: Buffer): void {
    const rect = this.tileRect(index);
    const rowBytes = rect.width * CHANNELS;
    if (tile.length !== rowBytes * rect.height) {
      throw new RangeError(`Tile raster is ${tile.length} bytes, expected ${rowBytes * rect.height}`);
    }
    for (let y = 0; y < rect.height; y++) {
      const dst = ((rect.top + y) * this.size + rect.left) * CHANNELS;
      tile.copy(this.pixels, dst, y * rowBytes, (y + 1) * rowBytes);
    }
  }

  readTile(index: number): Buffer {
    const rect = this.tileRect(index);
    const rowBytes = rect.width * CHANNELS;
    const out = Buffer.alloc(rowBytes * rect.height);
    for (let y = 0; y < rect.height; y++) {
      const src = ((rect.top + y) * this.size + rect.left) * CHANNELS;
      this.pixels.copy(out, y * rowBytes, src, src + rowBytes);
    }
    return out;
  }

  raw(): Buffer {
    return Buffer.from(this.pixels);
  }

  async toPng(): Promise<Buffer> {
    return sharp(this.pixels, { raw: { width: this.size, height: this.size, channels: CHANNELS } })
      .png()
      .toBuffer();
  }
}

/** Decode any image sharp understands into a size x size RGB raster (alpha dropped). */
export async function decodeRgb(bytes: Buffer, size: number): Promise<Buffer> {
  return sharp(bytes)
    .resize(size, size, { fit: 'fill' })
    .removeAlpha()
    .toColourspace('srgb')
    .raw()
    .toBuffer();
}
