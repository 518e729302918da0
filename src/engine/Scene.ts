// Scene — the draw list plus the camera and light uniforms shared by every
// draw; renders into a Framebuffer through the reference rasterizer.

import { createFragmentStage } from "../stages/fragmentStage";
import type { CameraUniform, InstanceInput, LightUniform } from "../stages/types";
import type { SurfaceBindings } from "./Bindings";
import type { ShaderFeatures } from "./Features";
import type { Framebuffer } from "./Framebuffer";
import type { Mesh } from "./Mesh";
import { Rasterizer } from "./Rasterizer";
import type { CullMode, DrawStats } from "./Rasterizer";

export interface Draw {
  mesh: Mesh;
  instances: readonly InstanceInput[];
  features: ShaderFeatures;
  bindings?: SurfaceBindings;
}

export class Scene {
  draws: Draw[] = [];
  camera: CameraUniform;
  light: LightUniform;

  constructor(camera: CameraUniform, light: LightUniform) {
    this.camera = camera;
    this.light = light;
  }

  add(draw: Draw): void {
    this.draws.push(draw);
  }

  /**
   * Draws everything in insertion order. Each draw gets its own fragment
   * stage, built for its feature set before any fragment runs.
   */
  render(target: Framebuffer, cullMode: CullMode = "back"): DrawStats {
    const total: DrawStats = { triangles: 0, culled: 0, fragments: 0 };
    for (const draw of this.draws) {
      const rasterizer = new Rasterizer(target, {
        camera: this.camera,
        light: this.light,
        fragmentStage: createFragmentStage(draw.features, draw.bindings),
        cullMode,
      });
      const stats = rasterizer.drawInstanced(draw.mesh, draw.instances);
      total.triangles += stats.triangles;
      total.culled += stats.culled;
      total.fragments += stats.fragments;
    }
    return total;
  }
}
