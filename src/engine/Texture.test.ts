import { describe, it, expect } from "vitest";
import { expectClose } from "../testing";
import { Sampler, Texture } from "./Texture";

// 2×1: black | white
const ramp = new Texture({ width: 2, height: 1, data: new Uint8Array([0, 0, 0, 255, 255, 255, 255, 255]) });

describe("Texture", () => {
  it("rejects data that does not match its size", () => {
    expect(() => new Texture({ width: 2, height: 2, data: new Uint8Array(4) })).toThrow(
      "Texture data has 4 bytes, expected 16",
    );
    expect(() => new Texture({ width: 0, height: 1, data: new Uint8Array(0) })).toThrow("Invalid texture size 0x1");
  });
});

describe("Sampler", () => {
  it("defaults to clamp-to-edge and nearest", () => {
    const sampler = new Sampler();
    expect([sampler.addressModeU, sampler.addressModeV, sampler.magFilter]).toEqual(["clamp-to-edge", "clamp-to-edge", "nearest"]);
  });

  it("picks the texel under the coordinate with nearest filtering", () => {
    const sampler = new Sampler();
    expectClose(sampler.sample(ramp, [0.25, 0.5]), [0, 0, 0, 1]);
    expectClose(sampler.sample(ramp, [0.75, 0.5]), [1, 1, 1, 1]);
  });

  it("clamps out-of-range coordinates to the edge", () => {
    const sampler = new Sampler();
    expectClose(sampler.sample(ramp, [-3, 0.5]), [0, 0, 0, 1]);
    expectClose(sampler.sample(ramp, [7.9, 0.5]), [1, 1, 1, 1]);
  });

  it("wraps with repeat and reflects with mirror-repeat", () => {
    const repeat = new Sampler({ addressModeU: "repeat" });
    const mirror = new Sampler({ addressModeU: "mirror-repeat" });

    // u = 1.25 → texel 2: repeat → 0 (black), mirror → 1 (white)
    expectClose(repeat.sample(ramp, [1.25, 0.5]), [0, 0, 0, 1]);
    expectClose(mirror.sample(ramp, [1.25, 0.5]), [1, 1, 1, 1]);
    // u = -0.25 → texel -1: repeat → 1 (white), mirror → 0 (black)
    expectClose(repeat.sample(ramp, [-0.25, 0.5]), [1, 1, 1, 1]);
    expectClose(mirror.sample(ramp, [-0.25, 0.5]), [0, 0, 0, 1]);
  });

  it("blends neighbouring texel centers with linear filtering", () => {
    const sampler = new Sampler({ magFilter: "linear" });

    // texel centers sit at u = 0.25 and 0.75
    expectClose(sampler.sample(ramp, [0.25, 0.5]), [0, 0, 0, 1]);
    expectClose(sampler.sample(ramp, [0.5, 0.5]), [0.5, 0.5, 0.5, 1]);
    expectClose(sampler.sample(ramp, [0.625, 0.5]), [0.75, 0.75, 0.75, 1]);
    // beyond the last center, clamp-to-edge holds the edge value
    expectClose(sampler.sample(ramp, [1, 0.5]), [1, 1, 1, 1]);
  });

  it("normalizes RGBA8 texels to [0, 1]", () => {
    const texel = new Sampler().sample(Texture.solid(51, 102, 204, 0), [0.5, 0.5]);
    expectClose(texel, [0.2, 0.4, 0.8, 0]);
  });
});
