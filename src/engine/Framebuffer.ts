// Framebuffer — float RGBA color target plus a depth buffer, the output of
// the reference rasterizer.

import { vec4 } from "gl-matrix";
import type { ReadonlyVec4 } from "gl-matrix";

export class Framebuffer {
  readonly width: number;
  readonly height: number;
  readonly color: Float32Array;
  readonly depth: Float32Array;

  constructor(width: number, height: number, clearColor: ReadonlyVec4 = [0, 0, 0, 1]) {
    if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
      throw new RangeError(`Invalid framebuffer size ${width}x${height}`);
    }
    this.width = width;
    this.height = height;
    this.color = new Float32Array(width * height * 4);
    this.depth = new Float32Array(width * height);
    this.clear(clearColor);
  }

  clear(clearColor: ReadonlyVec4 = [0, 0, 0, 1], clearDepth = 1): void {
    for (let i = 0; i < this.width * this.height; i++) {
      this.color.set(clearColor, i * 4);
    }
    this.depth.fill(clearDepth);
  }

  pixel(x: number, y: number): vec4 {
    const i = (y * this.width + x) * 4;
    return vec4.fromValues(this.color[i], this.color[i + 1], this.color[i + 2], this.color[i + 3]);
  }

  depthAt(x: number, y: number): number {
    return this.depth[y * this.width + x];
  }

  /** Writes a fragment if it passes the `less` depth test. Returns whether it was written. */
  write(x: number, y: number, depth: number, color: ReadonlyVec4): boolean {
    const i = y * this.width + x;
    if (!(depth < this.depth[i])) return false;
    this.depth[i] = depth;
    this.color.set(color, i * 4);
    return true;
  }

  /** Clamps to [0, 1] and quantizes, as an rgba8unorm target would. */
  toRGBA8(): Uint8ClampedArray {
    const out = new Uint8ClampedArray(this.color.length);
    for (let i = 0; i < this.color.length; i++) {
      out[i] = Math.round(Math.min(Math.max(this.color[i], 0), 1) * 255);
    }
    return out;
  }

  /** Binary PPM (P6) of the RGB channels. */
  toPPM(): Uint8Array {
    const header = new TextEncoder().encode(`P6\n${this.width} ${this.height}\n255\n`);
    const rgba = this.toRGBA8();
    const out = new Uint8Array(header.length + this.width * this.height * 3);
    out.set(header, 0);
    for (let p = 0, o = header.length; p < this.width * this.height; p++, o += 3) {
      out[o] = rgba[p * 4];
      out[o + 1] = rgba[p * 4 + 1];
      out[o + 2] = rgba[p * 4 + 2];
    }
    return out;
  }
}
