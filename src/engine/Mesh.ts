// Mesh — interleaved vertex data plus the vertex buffer layouts the model
// pipeline reads it through.
//
// You describe attributes once as { location, size } and the layout helper
// computes stride, offsets and formats:
//   per vertex   (locations 0–4)   position, tex_coords, normal, tangent, bitangent
//   per instance (locations 5–11)  model matrix columns, normal matrix columns

import type { VertexInput } from "../stages/types";

export interface VertexAttribute {
  location: number; // @location(N) in the shader
  size: 2 | 3 | 4; // float components
}

export const VERTEX_ATTRIBUTES: readonly VertexAttribute[] = [
  { location: 0, size: 3 },
  { location: 1, size: 2 },
  { location: 2, size: 3 },
  { location: 3, size: 3 },
  { location: 4, size: 3 },
];

export const INSTANCE_ATTRIBUTES: readonly VertexAttribute[] = [
  { location: 5, size: 4 },
  { location: 6, size: 4 },
  { location: 7, size: 4 },
  { location: 8, size: 4 },
  { location: 9, size: 3 },
  { location: 10, size: 3 },
  { location: 11, size: 3 },
];

export const FLOATS_PER_VERTEX = 14;

const FORMATS: Record<VertexAttribute["size"], GPUVertexFormat> = {
  2: "float32x2",
  3: "float32x3",
  4: "float32x4",
};

export function bufferLayout(attributes: readonly VertexAttribute[], stepMode: GPUVertexStepMode): GPUVertexBufferLayout {
  let offset = 0;
  const gpuAttributes: GPUVertexAttribute[] = [];
  for (const attr of attributes) {
    gpuAttributes.push({ shaderLocation: attr.location, offset, format: FORMATS[attr.size] });
    offset += attr.size * Float32Array.BYTES_PER_ELEMENT;
  }
  return { arrayStride: offset, stepMode, attributes: gpuAttributes };
}

export const VERTEX_BUFFER_LAYOUT = bufferLayout(VERTEX_ATTRIBUTES, "vertex");
export const INSTANCE_BUFFER_LAYOUT = bufferLayout(INSTANCE_ATTRIBUTES, "instance");

export class Mesh {
  readonly data: Float32Array;
  readonly vertexCount: number;

  constructor(data: Float32Array) {
    if (data.length % FLOATS_PER_VERTEX !== 0) {
      throw new RangeError(`Vertex data length ${data.length} is not a multiple of ${FLOATS_PER_VERTEX}`);
    }
    this.data = data;
    this.vertexCount = data.length / FLOATS_PER_VERTEX;
  }

  static fromVertices(vertices: readonly VertexInput[]): Mesh {
    const data = new Float32Array(vertices.length * FLOATS_PER_VERTEX);
    vertices.forEach((v, i) => {
      const o = i * FLOATS_PER_VERTEX;
      data.set(v.position, o);
      data.set(v.texCoords, o + 3);
      data.set(v.normal, o + 5);
      data.set(v.tangent, o + 8);
      data.set(v.bitangent, o + 11);
    });
    return new Mesh(data);
  }

  /** Views onto vertex `index`; no copy is made. */
  vertex(index: number): VertexInput {
    if (!Number.isInteger(index) || index < 0 || index >= this.vertexCount) {
      throw new RangeError(`Vertex index ${index} out of range (count ${this.vertexCount})`);
    }
    const o = index * FLOATS_PER_VERTEX;
    return {
      position: this.data.subarray(o, o + 3),
      texCoords: this.data.subarray(o + 3, o + 5),
      normal: this.data.subarray(o + 5, o + 8),
      tangent: this.data.subarray(o + 8, o + 11),
      bitangent: this.data.subarray(o + 11, o + 14),
    };
  }
}

