// vertexStage — CPU evaluation of the `vs_main` entry point.
//
// Mirrors the WGSL line for line so the two can be compared in tests:
//   1. normal/tangent/bitangent × normal matrix, each normalized afterwards
//   2. basis = transpose(mat3(T, B, N)), world → tangent space
//   3. world = model · (position, 1)
//   4. clip = proj · view · world
//   5. fragment, light and camera positions re-expressed in tangent space
//
// The basis is never orthogonalized. A skewed TBN from upstream yields a
// skewed basis, and the artifacts show up in the lit result.

import { mat3, mat4, vec2, vec3, vec4 } from "gl-matrix";
import type { ReadonlyMat3, ReadonlyVec3, ReadonlyVec4 } from "gl-matrix";
import type { CameraUniform, InstanceInput, LightUniform, VertexInput, VertexOutput } from "./types";

/** Multiplies a direction by the normal matrix and normalizes the result. */
export function transformDirection(direction: ReadonlyVec3, normalMatrix: ReadonlyMat3): vec3 {
  const out = vec3.transformMat3(vec3.create(), direction, normalMatrix);
  return vec3.normalize(out, out);
}

/**
 * Builds the world → tangent space matrix from a (T, B, N) triple.
 * For an orthonormal triple this is the inverse of mat3(T, B, N).
 */
export function tangentBasis(tangent: ReadonlyVec3, bitangent: ReadonlyVec3, normal: ReadonlyVec3): mat3 {
  // prettier-ignore
  const tbn = mat3.fromValues(
    tangent[0], tangent[1], tangent[2],
    bitangent[0], bitangent[1], bitangent[2],
    normal[0], normal[1], normal[2],
  );
  return mat3.transpose(tbn, tbn);
}

function xyz(v: ReadonlyVec4): vec3 {
  return vec3.fromValues(v[0], v[1], v[2]);
}

function toTangentSpace(point: ReadonlyVec3, basis: ReadonlyMat3): vec3 {
  return vec3.transformMat3(vec3.create(), point, basis);
}

export function runVertexStage(
  vertex: VertexInput,
  instance: InstanceInput,
  camera: CameraUniform,
  light: LightUniform,
): VertexOutput {
  const worldNormal = transformDirection(vertex.normal, instance.normal);
  const worldTangent = transformDirection(vertex.tangent, instance.normal);
  const worldBitangent = transformDirection(vertex.bitangent, instance.normal);
  const basis = tangentBasis(worldTangent, worldBitangent, worldNormal);

  const position = vec4.fromValues(vertex.position[0], vertex.position[1], vertex.position[2], 1);
  const worldPosition = vec4.transformMat4(vec4.create(), position, instance.model);

  // (proj · view) · world, same association as the WGSL expression
  const viewProjection = mat4.multiply(mat4.create(), camera.projection, camera.view);
  const clipPosition = vec4.transformMat4(vec4.create(), worldPosition, viewProjection);

  return {
    clipPosition,
    texCoords: vec2.clone(vertex.texCoords),
    tangentPosition: toTangentSpace(xyz(worldPosition), basis),
    tangentLightPosition: toTangentSpace(light.position, basis),
    tangentViewPosition: toTangentSpace(xyz(camera.viewPosition), basis),
    worldNormal,
  };
}
