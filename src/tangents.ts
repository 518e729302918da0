// Tangent calculation — computes per-vertex tangent and bitangent vectors for
// normal mapping.
//
// The tangent follows +u and the bitangent follows +v across each triangle,
// derived from the edge vectors and UV deltas:
//   T = (e1 * dv2 - e2 * dv1) / det
//   B = (e2 * du1 - e1 * du2) / det
//
// The tangent is Gram-Schmidt orthogonalized against the normal and the
// bitangent rebuilt as ±cross(N, T), keeping the handedness of the UV
// mapping. This happens once, at authoring time; the vertex stage uses
// whatever basis it is given.
//
// Input:  interleaved [px,py,pz, u,v, nx,ny,nz, ...] (8 floats/vertex, triangle list)
// Output: interleaved [px,py,pz, u,v, nx,ny,nz, tx,ty,tz, bx,by,bz, ...] (14 floats/vertex)

export function computeTangents(vertices: Float32Array): Float32Array {
  const inStride = 8; // 3 pos + 2 uv + 3 normal
  const outStride = 14; // + 3 tangent + 3 bitangent
  if (vertices.length % (inStride * 3) !== 0) {
    throw new RangeError(`Expected whole triangles of ${inStride} floats per vertex, got ${vertices.length} floats`);
  }
  const vertexCount = vertices.length / inStride;
  const out = new Float32Array(vertexCount * outStride);

  // Accumulated per vertex; triangles that share a vertex position do not
  // share an index here, so each vertex only sees its own triangle.
  const tangents = new Float32Array(vertexCount * 3);
  const bitangents = new Float32Array(vertexCount * 3);

  for (let i = 0; i < vertexCount; i += 3) {
    const i0 = i * inStride;
    const i1 = (i + 1) * inStride;
    const i2 = (i + 2) * inStride;

    const e1x = vertices[i1] - vertices[i0], e1y = vertices[i1 + 1] - vertices[i0 + 1], e1z = vertices[i1 + 2] - vertices[i0 + 2];
    const e2x = vertices[i2] - vertices[i0], e2y = vertices[i2 + 1] - vertices[i0 + 1], e2z = vertices[i2 + 2] - vertices[i0 + 2];

    const du1 = vertices[i1 + 3] - vertices[i0 + 3], dv1 = vertices[i1 + 4] - vertices[i0 + 4];
    const du2 = vertices[i2 + 3] - vertices[i0 + 3], dv2 = vertices[i2 + 4] - vertices[i0 + 4];

    const det = du1 * dv2 - du2 * dv1;
    const invDet = Math.abs(det) > 1e-8 ? 1.0 / det : 0.0;

    const tx = (e1x * dv2 - e2x * dv1) * invDet;
    const ty = (e1y * dv2 - e2y * dv1) * invDet;
    const tz = (e1z * dv2 - e2z * dv1) * invDet;

    const bx = (e2x * du1 - e1x * du2) * invDet;
    const by = (e2y * du1 - e1y * du2) * invDet;
    const bz = (e2z * du1 - e1z * du2) * invDet;

    for (let v = 0; v < 3; v++) {
      const ti = (i + v) * 3;
      tangents[ti] += tx;
      tangents[ti + 1] += ty;
      tangents[ti + 2] += tz;
      bitangents[ti] += bx;
      bitangents[ti + 1] += by;
      bitangents[ti + 2] += bz;
    }
  }

  for (let i = 0; i < vertexCount; i++) {
    const inOff = i * inStride;
    const outOff = i * outStride;

    for (let j = 0; j < inStride; j++) {
      out[outOff + j] = vertices[inOff + j];
    }

    const ti = i * 3;
    let tx = tangents[ti], ty = tangents[ti + 1], tz = tangents[ti + 2];
    const nx = vertices[inOff + 5], ny = vertices[inOff + 6], nz = vertices[inOff + 7];

    // T = T - N * dot(N, T)
    const dot = nx * tx + ny * ty + nz * tz;
    tx -= nx * dot;
    ty -= ny * dot;
    tz -= nz * dot;

    const len = Math.sqrt(tx * tx + ty * ty + tz * tz);
    if (len > 1e-8) {
      tx /= len;
      ty /= len;
      tz /= len;
    }

    // B = cross(N, T), flipped when the UV mapping is mirrored
    let bx = ny * tz - nz * ty;
    let by = nz * tx - nx * tz;
    let bz = nx * ty - ny * tx;
    const handedness = bx * bitangents[ti] + by * bitangents[ti + 1] + bz * bitangents[ti + 2] < 0 ? -1 : 1;
    bx *= handedness;
    by *= handedness;
    bz *= handedness;

    out[outOff + 8] = tx;
    out[outOff + 9] = ty;
    out[outOff + 10] = tz;
    out[outOff + 11] = bx;
    out[outOff + 12] = by;
    out[outOff + 13] = bz;
  }

  return out;
}
