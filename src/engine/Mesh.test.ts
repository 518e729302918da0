import { describe, it, expect } from "vitest";
import { expectClose } from "../testing";
import { createQuad } from "../geometry";
import { computeTangents } from "../tangents";
import { FLOATS_PER_VERTEX, INSTANCE_BUFFER_LAYOUT, Mesh, VERTEX_BUFFER_LAYOUT } from "./Mesh";

describe("buffer layouts", () => {
  it("packs the per-vertex attributes at locations 0–4", () => {
    expect(VERTEX_BUFFER_LAYOUT.arrayStride).toBe(FLOATS_PER_VERTEX * 4);
    expect(VERTEX_BUFFER_LAYOUT.stepMode).toBe("vertex");
    expect(Array.from(VERTEX_BUFFER_LAYOUT.attributes)).toEqual([
      { shaderLocation: 0, offset: 0, format: "float32x3" },
      { shaderLocation: 1, offset: 12, format: "float32x2" },
      { shaderLocation: 2, offset: 20, format: "float32x3" },
      { shaderLocation: 3, offset: 32, format: "float32x3" },
      { shaderLocation: 4, offset: 44, format: "float32x3" },
    ]);
  });

  it("packs the per-instance matrices at locations 5–11", () => {
    expect(INSTANCE_BUFFER_LAYOUT.arrayStride).toBe(100);
    expect(INSTANCE_BUFFER_LAYOUT.stepMode).toBe("instance");
    expect(Array.from(INSTANCE_BUFFER_LAYOUT.attributes).map((a) => [a.shaderLocation, a.offset, a.format])).toEqual([
      [5, 0, "float32x4"],
      [6, 16, "float32x4"],
      [7, 32, "float32x4"],
      [8, 48, "float32x4"],
      [9, 64, "float32x3"],
      [10, 76, "float32x3"],
      [11, 88, "float32x3"],
    ]);
  });
});

describe("Mesh", () => {
  it("round-trips vertices through the interleaved layout", () => {
    const mesh = Mesh.fromVertices([
      { position: [1, 2, 3], texCoords: [0.25, 0.75], normal: [0, 0, 1], tangent: [1, 0, 0], bitangent: [0, 1, 0] },
    ]);
    const v = mesh.vertex(0);

    expect(mesh.vertexCount).toBe(1);
    expect(Array.from(v.position)).toEqual([1, 2, 3]);
    expect(Array.from(v.texCoords)).toEqual([0.25, 0.75]);
    expect(Array.from(v.normal)).toEqual([0, 0, 1]);
    expect(Array.from(v.tangent)).toEqual([1, 0, 0]);
    expect(Array.from(v.bitangent)).toEqual([0, 1, 0]);
  });

  it("rejects partial vertices and out-of-range indices", () => {
    expect(() => new Mesh(new Float32Array(15))).toThrow("Vertex data length 15 is not a multiple of 14");
    expect(() => new Mesh(new Float32Array(14)).vertex(1)).toThrow("Vertex index 1 out of range (count 1)");
  });
});

describe("computeTangents", () => {
  it("follows +u for the tangent and +v for the bitangent", () => {
    // prettier-ignore
    const out = computeTangents(new Float32Array([
      0, 0, 0,   0, 0,   0, 0, 1,
      1, 0, 0,   1, 0,   0, 0, 1,
      0, 1, 0,   0, 1,   0, 0, 1,
    ]));

    expect(out.length).toBe(3 * 14);
    expectClose(out.subarray(8, 14), [1, 0, 0, 0, 1, 0]);
  });

  it("keeps the handedness of a mirrored mapping", () => {
    // prettier-ignore
    const out = computeTangents(new Float32Array([
      0, 0, 0,   1, 0,   0, 0, 1,
      1, 0, 0,   0, 0,   0, 0, 1,
      0, 1, 0,   1, 1,   0, 0, 1,
    ]));

    expectClose(out.subarray(8, 14), [-1, 0, 0, 0, 1, 0]);
  });

  it("rejects input that is not whole triangles", () => {
    expect(() => computeTangents(new Float32Array(16))).toThrow(
      "Expected whole triangles of 8 floats per vertex, got 16 floats",
    );
  });
});

describe("createQuad", () => {
  it("faces +Z with the tangent along +X and the bitangent along −Y", () => {
    const quad = createQuad(2);

    expect(quad.vertexCount).toBe(6);
    for (let i = 0; i < quad.vertexCount; i++) {
      const v = quad.vertex(i);
      expectClose(v.normal, [0, 0, 1]);
      expectClose(v.tangent, [1, 0, 0]);
      expectClose(v.bitangent, [0, -1, 0]);
    }
    expectClose(quad.vertex(2).position, [2, 2, 0]);
    expectClose(quad.vertex(2).texCoords, [1, 0]);
  });
});
