// Texture — CPU-side RGBA8 texture plus the sampler state used to read it.
//
// Sampling follows the WebGPU rules for a single mip level: texel centers sit
// at half-integer coordinates, "linear" blends the 2×2 neighbourhood, and the
// address mode is applied to integer texel indices.

import { vec4 } from "gl-matrix";
import type { ReadonlyVec2 } from "gl-matrix";

export interface TextureOptions {
  width: number;
  height: number;
  data: Uint8Array;
}

export type SamplerOptions = Pick<GPUSamplerDescriptor, "addressModeU" | "addressModeV" | "magFilter">;

export class Texture {
  readonly width: number;
  readonly height: number;
  readonly data: Uint8Array;

  constructor(options: TextureOptions) {
    const { width, height, data } = options;
    if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
      throw new RangeError(`Invalid texture size ${width}x${height}`);
    }
    if (data.length !== width * height * 4) {
      throw new RangeError(`Texture data has ${data.length} bytes, expected ${width * height * 4}`);
    }
    this.width = width;
    this.height = height;
    this.data = data;
  }

  /** 1×1 texture of a single RGBA8 color. */
  static solid(r: number, g: number, b: number, a = 255): Texture {
    return new Texture({ width: 1, height: 1, data: new Uint8Array([r, g, b, a]) });
  }

  /** Reads texel (x, y) as normalized floats. Indices must already be in range. */
  texel(out: vec4, x: number, y: number): vec4 {
    const i = (y * this.width + x) * 4;
    return vec4.set(out, this.data[i] / 255, this.data[i + 1] / 255, this.data[i + 2] / 255, this.data[i + 3] / 255);
  }
}

function applyAddressMode(mode: GPUAddressMode, i: number, size: number): number {
  switch (mode) {
    case "repeat":
      return ((i % size) + size) % size;
    case "mirror-repeat": {
      const period = size * 2;
      const m = ((i % period) + period) % period;
      return m < size ? m : period - 1 - m;
    }
    case "clamp-to-edge":
      return Math.min(Math.max(i, 0), size - 1);
  }
}

export class Sampler {
  readonly addressModeU: GPUAddressMode;
  readonly addressModeV: GPUAddressMode;
  readonly magFilter: GPUFilterMode;

  constructor(options: SamplerOptions = {}) {
    this.addressModeU = options.addressModeU ?? "clamp-to-edge";
    this.addressModeV = options.addressModeV ?? "clamp-to-edge";
    this.magFilter = options.magFilter ?? "nearest";
  }

  sample(texture: Texture, uv: ReadonlyVec2): vec4 {
    const out = vec4.create();
    if (this.magFilter === "nearest") {
      const x = applyAddressMode(this.addressModeU, Math.floor(uv[0] * texture.width), texture.width);
      const y = applyAddressMode(this.addressModeV, Math.floor(uv[1] * texture.height), texture.height);
      return texture.texel(out, x, y);
    }

    const fx = uv[0] * texture.width - 0.5;
    const fy = uv[1] * texture.height - 0.5;
    const x0 = Math.floor(fx);
    const y0 = Math.floor(fy);
    const tx = fx - x0;
    const ty = fy - y0;
    const xa = applyAddressMode(this.addressModeU, x0, texture.width);
    const xb = applyAddressMode(this.addressModeU, x0 + 1, texture.width);
    const ya = applyAddressMode(this.addressModeV, y0, texture.height);
    const yb = applyAddressMode(this.addressModeV, y0 + 1, texture.height);

    const t00 = texture.texel(vec4.create(), xa, ya);
    const t10 = texture.texel(vec4.create(), xb, ya);
    const t01 = texture.texel(vec4.create(), xa, yb);
    const t11 = texture.texel(vec4.create(), xb, yb);
    const top = vec4.lerp(vec4.create(), t00, t10, tx);
    const bottom = vec4.lerp(vec4.create(), t01, t11, tx);
    return vec4.lerp(out, top, bottom, ty);
  }
}
