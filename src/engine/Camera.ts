// Camera — the group 1 uniform: eye position, view matrix and projection
// matrix, kept separate. The vertex stage composes proj · view itself.

import { mat4, vec4 } from "gl-matrix";
import type { ReadonlyMat4, ReadonlyVec3 } from "gl-matrix";
import type { CameraUniform } from "../stages/types";

export const CAMERA_UNIFORM_FLOATS = 36;

export interface PerspectiveOptions {
  fovy: number;
  aspect: number;
  near: number;
  far: number;
}

export class Camera implements CameraUniform {
  readonly viewPosition: vec4;
  readonly view: mat4;
  readonly projection: mat4;

  constructor(eye: ReadonlyVec3, view: ReadonlyMat4, projection: ReadonlyMat4) {
    this.viewPosition = vec4.fromValues(eye[0], eye[1], eye[2], 1);
    this.view = mat4.clone(view);
    this.projection = mat4.clone(projection);
  }

  /** Perspective camera with WebGPU's [0, 1] depth range. */
  static lookAt(eye: ReadonlyVec3, target: ReadonlyVec3, up: ReadonlyVec3, options: PerspectiveOptions): Camera {
    const view = mat4.lookAt(mat4.create(), eye, target, up);
    const projection = mat4.perspectiveZO(mat4.create(), options.fovy, options.aspect, options.near, options.far);
    return new Camera(eye, view, projection);
  }

  /** Packs view_pos, view, proj in uniform buffer order (144 bytes). */
  toUniformData(out: Float32Array = new Float32Array(CAMERA_UNIFORM_FLOATS)): Float32Array {
    if (out.length < CAMERA_UNIFORM_FLOATS) throw new RangeError(`Camera uniform needs ${CAMERA_UNIFORM_FLOATS} floats`);
    out.set(this.viewPosition, 0);
    out.set(this.view, 4);
    out.set(this.projection, 20);
    return out;
  }
}
