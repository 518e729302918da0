// Instance — one drawn copy of a mesh: model matrix plus its normal matrix.
//
// The matrices stay first-class values everywhere except here, where they
// are flattened into (and read back from) the per-instance vertex buffer:
// four vec4 model columns followed by three vec3 normal-matrix columns.
//
// Locations 9–11 carry the normal matrix's gl-matrix COLUMNS, not its rows:
// the shader rebuilds it with mat3x3f(c0, c1, c2), which takes columns.
// Sending rows would transpose the normal matrix.

import { mat3, mat4 } from "gl-matrix";
import type { ReadonlyMat3, ReadonlyMat4, ReadonlyQuat, ReadonlyVec3 } from "gl-matrix";
import type { InstanceInput } from "../stages/types";

export const INSTANCE_FLOATS = 25;

export class Instance implements InstanceInput {
  readonly model: mat4;
  readonly normal: mat3;

  constructor(model: ReadonlyMat4, normal: ReadonlyMat3) {
    this.model = mat4.clone(model);
    this.normal = mat3.clone(normal);
  }

  /** Derives the normal matrix (inverse-transpose of the upper-left 3×3). */
  static fromModel(model: ReadonlyMat4): Instance {
    const normal = mat3.normalFromMat4(mat3.create(), model);
    if (!normal) throw new Error("Model matrix is not invertible");
    return new Instance(model, normal);
  }

  /** Model = T × R × S. */
  static fromTransform(position: ReadonlyVec3, rotation: ReadonlyQuat, scale: ReadonlyVec3 = [1, 1, 1]): Instance {
    return Instance.fromModel(mat4.fromRotationTranslationScale(mat4.create(), rotation, position, scale));
  }
}

export function packInstances(instances: readonly InstanceInput[]): Float32Array {
  const out = new Float32Array(instances.length * INSTANCE_FLOATS);
  instances.forEach((instance, i) => {
    const offset = i * INSTANCE_FLOATS;
    out.set(instance.model, offset);
    out.set(instance.normal, offset + 16);
  });
  return out;
}

/** Reassembles instance `index` from a buffer written by packInstances. */
export function unpackInstance(data: Float32Array, index: number): Instance {
  if (data.length % INSTANCE_FLOATS !== 0) {
    throw new RangeError(`Instance buffer length ${data.length} is not a multiple of ${INSTANCE_FLOATS}`);
  }
  const count = data.length / INSTANCE_FLOATS;
  if (!Number.isInteger(index) || index < 0 || index >= count) {
    throw new RangeError(`Instance index ${index} out of range (count ${count})`);
  }
  const offset = index * INSTANCE_FLOATS;
  return new Instance(data.subarray(offset, offset + 16), data.subarray(offset + 16, offset + INSTANCE_FLOATS));
}
