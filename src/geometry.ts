// Geometry helpers for the demo and tests.

import { Mesh } from "./engine/Mesh";
import { computeTangents } from "./tangents";

/**
 * Square quad in the z = 0 plane facing +Z, counter-clockwise as seen from
 * +Z. UV origin is the top-left corner, as WebGPU samples textures.
 */
export function createQuad(halfSize = 1): Mesh {
  const s = halfSize;
  // prettier-ignore
  const base = new Float32Array([
    // pos          uv      normal
    -s, -s, 0,   0, 1,   0, 0, 1,
     s, -s, 0,   1, 1,   0, 0, 1,
     s,  s, 0,   1, 0,   0, 0, 1,

    -s, -s, 0,   0, 1,   0, 0, 1,
     s,  s, 0,   1, 0,   0, 0, 1,
    -s,  s, 0,   0, 0,   0, 0, 1,
  ]);
  return new Mesh(computeTangents(base));
}
