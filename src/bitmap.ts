/**
 * Packed 0xAARRGGBB framebuffer.
 *
 * Pixels are addressed with y = 0 at the bottom row, matching the camera's
 * image plane; storage is top-down so the buffer can be presented as-is.
 */

export class Bitmap {
  readonly buffer: Uint32Array;

  constructor(
    readonly width: number,
    readonly height: number,
    buffer?: Uint32Array
  ) {
    if (buffer && buffer.length !== width * height) {
      throw new Error(`Buffer holds ${buffer.length} pixels, expected ${width * height}`);
    }
    this.buffer = buffer ?? new Uint32Array(width * height);
  }

  /** Storage index of (x, y), or null when out of bounds. */
  index(x: number, y: number): number | null {
    if (!Number.isInteger(x) || !Number.isInteger(y)) return null;
    if (x < 0 || y < 0 || x >= this.width || y >= this.height) return null;
    return (this.height - y - 1) * this.width + x;
  }

  get(x: number, y: number): number | null {
    const i = this.index(x, y);
    return i === null ? null : (this.buffer[i] ?? null);
  }

  /** Writes a packed color; returns false and leaves the buffer alone when out of bounds. */
  set(x: number, y: number, color: number): boolean {
    const i = this.index(x, y);
    if (i === null) return false;
    this.buffer[i] = color >>> 0;
    return true;
  }

  /** Copies a band of storage rows (top-down) into place. */
  writeRows(rowStart: number, pixels: Uint32Array): void {
    this.buffer.set(pixels, rowStart * this.width);
  }

  /** Copy of a band of storage rows, top-down. */
  readRows(rowStart: number, rowEnd: number): Uint32Array {
    return this.buffer.slice(rowStart * this.width, rowEnd * this.width);
  }
}
