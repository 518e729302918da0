// Per-invocation value bundles passed between the pipeline stages.
//
// Everything here is read-only from the stages' point of view: uniforms are
// owned by the host, attributes are owned by the vertex/instance buffers, and
// each stage returns freshly allocated outputs.

import type { ReadonlyMat3, ReadonlyMat4, ReadonlyVec2, ReadonlyVec3, ReadonlyVec4, vec2, vec3, vec4 } from "gl-matrix";

/** Camera uniform (group 1, binding 0). */
export interface CameraUniform {
  readonly viewPosition: ReadonlyVec4;
  readonly view: ReadonlyMat4;
  readonly projection: ReadonlyMat4;
}

/** Point light uniform (group 2, binding 0). Color is unbounded. */
export interface LightUniform {
  readonly position: ReadonlyVec3;
  readonly color: ReadonlyVec3;
}

/** Per-vertex attributes, locations 0–4. Directions need not be unit length. */
export interface VertexInput {
  readonly position: ReadonlyVec3;
  readonly texCoords: ReadonlyVec2;
  readonly normal: ReadonlyVec3;
  readonly tangent: ReadonlyVec3;
  readonly bitangent: ReadonlyVec3;
}

/**
 * Per-instance transform pair, locations 5–11 once packed.
 * `normal` is the inverse-transpose of `model`'s upper-left 3×3.
 */
export interface InstanceInput {
  readonly model: ReadonlyMat4;
  readonly normal: ReadonlyMat3;
}

export interface VertexOutput {
  clipPosition: vec4;
  texCoords: vec2;
  tangentPosition: vec3;
  tangentLightPosition: vec3;
  tangentViewPosition: vec3;
  worldNormal: vec3;
}

/** What the fragment stage sees: the vertex outputs after interpolation, minus clip position. */
export interface FragmentInput {
  readonly texCoords: ReadonlyVec2;
  readonly tangentPosition: ReadonlyVec3;
  readonly tangentLightPosition: ReadonlyVec3;
  readonly tangentViewPosition: ReadonlyVec3;
  readonly worldNormal: ReadonlyVec3;
}
