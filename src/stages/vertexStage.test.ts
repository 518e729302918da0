import { describe, it, expect } from "vitest";
import { mat3, mat4, quat, vec3 } from "gl-matrix";
import { expectClose } from "../testing";
import { runVertexStage, tangentBasis, transformDirection } from "./vertexStage";
import type { CameraUniform, InstanceInput, LightUniform, VertexInput } from "./types";

const identityCamera: CameraUniform = {
  viewPosition: [0, 0, 0, 1],
  view: mat4.create(),
  projection: mat4.create(),
};

const light: LightUniform = { position: [3, 4, 5], color: [1, 1, 1] };

function vertex(overrides: Partial<VertexInput> = {}): VertexInput {
  return {
    position: [0, 0, 0],
    texCoords: [0.25, 0.75],
    normal: [0, 0, 1],
    tangent: [1, 0, 0],
    bitangent: [0, 1, 0],
    ...overrides,
  };
}

function instanceFromModel(model: mat4): InstanceInput {
  const normal = mat3.normalFromMat4(mat3.create(), model);
  if (!normal) throw new Error("singular model matrix");
  return { model, normal };
}

describe("runVertexStage", () => {
  it("composes clip = proj · view · world in that order", () => {
    const model = mat4.fromTranslation(mat4.create(), [1, 2, 3]);
    const view = mat4.fromTranslation(mat4.create(), [0, 0, -5]);
    const projection = mat4.perspectiveZO(mat4.create(), Math.PI / 2, 1, 1, 10);
    const camera: CameraUniform = { viewPosition: [0, 0, 5, 1], view, projection };

    const out = runVertexStage(vertex({ position: [1, 0, 0] }), instanceFromModel(model), camera, light);

    // world (2, 2, 3) → view (2, 2, -2) → clip (2, 2, 10/9, 2)
    expectClose(out.clipPosition, [2, 2, 10 / 9, 2]);
  });

  it("passes texture coordinates through", () => {
    const out = runVertexStage(vertex(), instanceFromModel(mat4.create()), identityCamera, light);
    expectClose(out.texCoords, [0.25, 0.75]);
  });

  it("normalizes the transformed normal after the normal-matrix multiply", () => {
    const model = mat4.fromScaling(mat4.create(), [2, 1, 1]);
    const out = runVertexStage(vertex({ normal: [1, 1, 0] }), instanceFromModel(model), identityCamera, light);

    // inverse-transpose of diag(2,1,1) is diag(0.5,1,1): (1,1,0) → (0.5,1,0) → unit
    expectClose(out.worldNormal, [1 / Math.sqrt(5), 2 / Math.sqrt(5), 0]);
    expect(vec3.length(out.worldNormal)).toBeCloseTo(1, 6);
  });

  it("expresses fragment, light and view positions in the same tangent basis", () => {
    const input = vertex({ position: [7, 8, 9], tangent: [0, 1, 0], bitangent: [0, 0, 1], normal: [1, 0, 0] });
    const camera: CameraUniform = { ...identityCamera, viewPosition: [1, 2, 3, 1] };

    const out = runVertexStage(input, instanceFromModel(mat4.create()), camera, light);

    // (T·p, B·p, N·p) with T = +Y, B = +Z, N = +X
    expectClose(out.tangentPosition, [8, 9, 7]);
    expectClose(out.tangentLightPosition, [4, 5, 3]);
    expectClose(out.tangentViewPosition, [2, 3, 1]);
    expectClose(out.worldNormal, [1, 0, 0]);
  });

  it("does not orthogonalize a skewed tangent frame", () => {
    const input = vertex({ position: [0, 1, 0], bitangent: [1, 1, 0] });
    const out = runVertexStage(input, instanceFromModel(mat4.create()), identityCamera, light);

    // B stays (1,1,0)/√2 instead of being straightened to +Y
    expectClose(out.tangentPosition, [0, Math.SQRT1_2, 0]);
  });

  it("leaves its inputs untouched", () => {
    const input = vertex({ position: new Float32Array([1, 2, 3]), normal: new Float32Array([0, 2, 0]) });
    const model = mat4.fromTranslation(mat4.create(), [4, 5, 6]);
    const instance = instanceFromModel(model);
    const modelBefore = mat4.clone(model);

    runVertexStage(input, instance, identityCamera, light);

    expect(Array.from(input.position)).toEqual([1, 2, 3]);
    expect(Array.from(input.normal)).toEqual([0, 2, 0]);
    expect(mat4.equals(instance.model, modelBefore)).toBe(true);
  });
});

describe("tangentBasis", () => {
  const rotations = [
    quat.create(),
    quat.setAxisAngle(quat.create(), [0, 0, 1], Math.PI / 3),
    quat.setAxisAngle(quat.create(), vec3.normalize(vec3.create(), [1, 2, 3]), 1.1),
    quat.setAxisAngle(quat.create(), vec3.normalize(vec3.create(), [-2, 0.5, 1]), 2.7),
  ];

  it.each(rotations.map((q, i) => [i, q] as const))("is orthogonal for orthonormal frame #%i", (_, q) => {
    const t = vec3.transformQuat(vec3.create(), [1, 0, 0], q);
    const b = vec3.transformQuat(vec3.create(), [0, 1, 0], q);
    const n = vec3.transformQuat(vec3.create(), [0, 0, 1], q);

    const basis = tangentBasis(t, b, n);
    const inverse = mat3.invert(mat3.create(), basis);
    const transpose = mat3.transpose(mat3.create(), basis);
    if (!inverse) throw new Error("basis is singular");

    expectClose(transpose, Array.from(inverse));
  });

  it("maps the frame's own axes onto the unit axes", () => {
    const t = vec3.fromValues(0, 0, -1);
    const b = vec3.fromValues(0, 1, 0);
    const n = vec3.fromValues(1, 0, 0);
    const basis = tangentBasis(t, b, n);

    expectClose(vec3.transformMat3(vec3.create(), t, basis), [1, 0, 0]);
    expectClose(vec3.transformMat3(vec3.create(), b, basis), [0, 1, 0]);
    expectClose(vec3.transformMat3(vec3.create(), n, basis), [0, 0, 1]);
  });
});

describe("transformDirection", () => {
  it("returns a unit vector for any non-zero input", () => {
    const out = transformDirection([0, 3, 4], mat3.create());
    expectClose(out, [0, 0.6, 0.8]);
  });
});
