import { describe, it, expect } from "vitest";
import { vec2, vec3 } from "gl-matrix";
import { Camera, Framebuffer, Instance, Light, Scene } from "./engine";
import { createQuad } from "./geometry";
import { blinnPhong, createFragmentStage, createNormalReader, runVertexStage } from "./stages";
import { expectClose } from "./testing";

// Camera at the origin looking down −Z, white light overhead at (0, 5, 0),
// a +Z facing quad three units in front of the camera, no texture maps.
// createQuad puts the UV origin top-left, so its basis is T = +X, B = −Y
// (mirrored in v); the identity-basis case is checked on its own below.
const camera = Camera.lookAt([0, 0, 0], [0, 0, -1], [0, 1, 0], { fovy: Math.PI / 2, aspect: 1, near: 0.1, far: 100 });
const quad = createQuad(1);
const instance = Instance.fromTransform([0, 0, -3], [0, 0, 0, 1]);
const plain = { colorMap: false, normalMap: false };

function render(light: Light): Framebuffer {
  const scene = new Scene(camera, light);
  scene.add({ mesh: quad, instances: [instance], features: plain });
  const target = new Framebuffer(32, 32, [0.5, 0.5, 0.5, 1]);
  scene.render(target);
  return target;
}

describe("vertex stage → fragment stage", () => {
  it("lights the point straight ahead of the camera", () => {
    const light = new Light([0, 5, 0], [1, 1, 1]);
    const center = { ...quad.vertex(0), position: vec3.fromValues(0, 0, 0) };
    const out = runVertexStage(center, instance, camera, light);
    const normal = createNormalReader({ kind: "vertex-normal" })(out);
    const terms = blinnPhong(out, light, normal);

    expectClose(terms.ambient, [0.1, 0.1, 0.1]);
    expect(terms.diffuse[0]).toBeCloseTo(0.5144958, 5);
    expect(terms.specular[0]).toBeCloseTo(0.5734243, 5);

    const color = createFragmentStage(plain)(out, light);
    expectClose(color, [1.1879201, 1.1879201, 1.1879201, 1], 4);
    // brighter than ambient alone, below ambient + full diffuse + full specular
    expect(color[0]).toBeGreaterThan(terms.ambient[0]);
    expect(color[0]).toBeLessThan(0.1 + terms.diffuse[0] + 1);
  });

  it("keeps tangent space equal to world space under an identity basis", () => {
    const light = new Light([0, 5, 0], [1, 1, 1]);
    const vertex = {
      position: vec3.fromValues(0.5, 0.5, 0),
      texCoords: vec2.fromValues(0, 0),
      normal: vec3.fromValues(0, 0, 1),
      tangent: vec3.fromValues(1, 0, 0),
      bitangent: vec3.fromValues(0, 1, 0),
    };
    const out = runVertexStage(vertex, instance, camera, light);

    expectClose(out.tangentPosition, [0.5, 0.5, -3]);
    expectClose(out.tangentLightPosition, [0, 5, 0]);
    expectClose(out.tangentViewPosition, [0, 0, 0]);

    const terms = blinnPhong(out, light, createNormalReader({ kind: "vertex-normal" })(out));
    expect(terms.diffuse[0]).toBeCloseTo(0.5523448, 5);
    expect(terms.specular[0]).toBeCloseTo(0.6735129, 5);
    expectClose(createFragmentStage(plain)(out, light), [1.3258576, 1.3258576, 1.3258576, 1], 4);
  });

  it("shades rasterized fragments with interpolated inputs", () => {
    const target = render(new Light([0, 5, 0], [1, 1, 1]));

    // pixel (16, 16) samples the quad at world (0.09375, −0.09375, −3)
    expectClose(target.pixel(16, 16), [1.1543353, 1.1543353, 1.1543353, 1], 4);
    // uncovered pixels keep the clear color
    expectClose(target.pixel(2, 2), [0.5, 0.5, 0.5, 1]);
  });

  it("renders black where an unlit surface covers the clear color", () => {
    const target = render(new Light([0, 5, 0], [0, 0, 0]));

    expectClose(target.pixel(16, 16), [0, 0, 0, 1]);
    expectClose(target.pixel(2, 2), [0.5, 0.5, 0.5, 1]);
  });

  it("scales every term with the light color", () => {
    const target = render(new Light([0, 5, 0], [2, 1, 0]));

    expectClose(target.pixel(16, 16), [2 * 1.1543353, 1.1543353, 0, 1], 4);
  });
});
