import { vec3 } from "gl-matrix";
import type { ReadonlyVec3 } from "gl-matrix";
import type { LightUniform } from "../stages/types";

export const LIGHT_UNIFORM_FLOATS = 8;

/** The single point light (group 2). Color channels are intensities and may exceed 1. */
export class Light implements LightUniform {
  position: vec3;
  color: vec3;

  constructor(position: ReadonlyVec3 = [3, 3, 0], color: ReadonlyVec3 = [1, 1, 1]) {
    this.position = vec3.clone(position);
    this.color = vec3.clone(color);
  }

  /** position, pad, color, pad: vec3f members are 16-byte aligned in WGSL. */
  toUniformData(out: Float32Array = new Float32Array(LIGHT_UNIFORM_FLOATS)): Float32Array {
    if (out.length < LIGHT_UNIFORM_FLOATS) throw new RangeError(`Light uniform needs ${LIGHT_UNIFORM_FLOATS} floats`);
    out.set(this.position, 0);
    out[3] = 0;
    out.set(this.color, 4);
    out[7] = 0;
    return out;
  }
}
