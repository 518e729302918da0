// Rasterizer — reference implementation of the fixed-function work between
// the two stages, so the pipeline can run without a GPU.
//
// Per triangle:
//   1. clip → NDC (divide by w) → framebuffer (y down, depth in [0, 1])
//   2. back-face cull (counter-clockwise in NDC is front)
//   3. coverage at pixel centers via edge functions
//   4. perspective-correct interpolation of every vertex output
//   5. depth test (less), then the fragment stage, then the write
//
// Triangles with any vertex at w <= 0 are dropped whole; there is no near
// plane clipping.

import { vec2, vec3 } from "gl-matrix";
import type { ReadonlyVec2, ReadonlyVec3 } from "gl-matrix";
import type { FragmentStage } from "../stages/fragmentStage";
import type { CameraUniform, FragmentInput, InstanceInput, LightUniform, VertexOutput } from "../stages/types";
import { runVertexStage } from "../stages/vertexStage";
import type { Framebuffer } from "./Framebuffer";
import type { Mesh } from "./Mesh";

export type CullMode = "none" | "back";

export interface RasterizerOptions {
  camera: CameraUniform;
  light: LightUniform;
  fragmentStage: FragmentStage;
  cullMode?: CullMode;
}

export interface DrawStats {
  triangles: number;
  culled: number;
  fragments: number;
}

interface ScreenVertex {
  x: number;
  y: number;
  z: number;
  invW: number;
  ndcX: number;
  ndcY: number;
}

function interpolate2(a: ReadonlyVec2, b: ReadonlyVec2, c: ReadonlyVec2, w0: number, w1: number, w2: number): vec2 {
  return vec2.fromValues(a[0] * w0 + b[0] * w1 + c[0] * w2, a[1] * w0 + b[1] * w1 + c[1] * w2);
}

function interpolate3(a: ReadonlyVec3, b: ReadonlyVec3, c: ReadonlyVec3, w0: number, w1: number, w2: number): vec3 {
  return vec3.fromValues(
    a[0] * w0 + b[0] * w1 + c[0] * w2,
    a[1] * w0 + b[1] * w1 + c[1] * w2,
    a[2] * w0 + b[2] * w1 + c[2] * w2,
  );
}

/** Interpolates the fragment inputs with perspective-correct weights. */
export function interpolateOutputs(
  v0: VertexOutput,
  v1: VertexOutput,
  v2: VertexOutput,
  w0: number,
  w1: number,
  w2: number,
): FragmentInput {
  return {
    texCoords: interpolate2(v0.texCoords, v1.texCoords, v2.texCoords, w0, w1, w2),
    tangentPosition: interpolate3(v0.tangentPosition, v1.tangentPosition, v2.tangentPosition, w0, w1, w2),
    tangentLightPosition: interpolate3(v0.tangentLightPosition, v1.tangentLightPosition, v2.tangentLightPosition, w0, w1, w2),
    tangentViewPosition: interpolate3(v0.tangentViewPosition, v1.tangentViewPosition, v2.tangentViewPosition, w0, w1, w2),
    worldNormal: interpolate3(v0.worldNormal, v1.worldNormal, v2.worldNormal, w0, w1, w2),
  };
}

export class Rasterizer {
  private target: Framebuffer;
  private camera: CameraUniform;
  private light: LightUniform;
  private fragmentStage: FragmentStage;
  private cullMode: CullMode;

  constructor(target: Framebuffer, options: RasterizerOptions) {
    this.target = target;
    this.camera = options.camera;
    this.light = options.light;
    this.fragmentStage = options.fragmentStage;
    this.cullMode = options.cullMode ?? "back";
  }

  /** Runs the vertex stage once per (vertex, instance) and rasterizes the triangle list. */
  drawInstanced(mesh: Mesh, instances: readonly InstanceInput[]): DrawStats {
    if (mesh.vertexCount % 3 !== 0) throw new RangeError(`Triangle list needs a multiple of 3 vertices, got ${mesh.vertexCount}`);
    const stats: DrawStats = { triangles: 0, culled: 0, fragments: 0 };

    for (const instance of instances) {
      for (let i = 0; i < mesh.vertexCount; i += 3) {
        const v0 = runVertexStage(mesh.vertex(i), instance, this.camera, this.light);
        const v1 = runVertexStage(mesh.vertex(i + 1), instance, this.camera, this.light);
        const v2 = runVertexStage(mesh.vertex(i + 2), instance, this.camera, this.light);
        const written = this.drawTriangle(v0, v1, v2);
        stats.triangles++;
        if (written === null) stats.culled++;
        else stats.fragments += written;
      }
    }
    return stats;
  }

  /** Returns the number of fragments written, or null when the triangle was dropped before coverage. */
  drawTriangle(v0: VertexOutput, v1: VertexOutput, v2: VertexOutput): number | null {
    const s0 = this.toScreen(v0);
    const s1 = this.toScreen(v1);
    const s2 = this.toScreen(v2);
    if (!s0 || !s1 || !s2) return null;

    const ndcArea = (s1.ndcX - s0.ndcX) * (s2.ndcY - s0.ndcY) - (s1.ndcY - s0.ndcY) * (s2.ndcX - s0.ndcX);
    if (ndcArea === 0) return null;
    if (this.cullMode === "back" && ndcArea < 0) return null;

    const area = edge(s0, s1, s2.x, s2.y);
    const { width, height } = this.target;
    const minX = Math.max(0, Math.floor(Math.min(s0.x, s1.x, s2.x)));
    const maxX = Math.min(width - 1, Math.ceil(Math.max(s0.x, s1.x, s2.x)));
    const minY = Math.max(0, Math.floor(Math.min(s0.y, s1.y, s2.y)));
    const maxY = Math.min(height - 1, Math.ceil(Math.max(s0.y, s1.y, s2.y)));

    let written = 0;
    for (let py = minY; py <= maxY; py++) {
      for (let px = minX; px <= maxX; px++) {
        const cx = px + 0.5;
        const cy = py + 0.5;
        const b0 = edge(s1, s2, cx, cy) / area;
        const b1 = edge(s2, s0, cx, cy) / area;
        const b2 = edge(s0, s1, cx, cy) / area;
        if (b0 < 0 || b1 < 0 || b2 < 0) continue;

        const depth = b0 * s0.z + b1 * s1.z + b2 * s2.z;
        if (depth < 0 || depth > 1) continue;
        if (!(depth < this.target.depthAt(px, py))) continue;

        const q0 = b0 * s0.invW;
        const q1 = b1 * s1.invW;
        const q2 = b2 * s2.invW;
        const sum = q0 + q1 + q2;
        const input = interpolateOutputs(v0, v1, v2, q0 / sum, q1 / sum, q2 / sum);
        const color = this.fragmentStage(input, this.light);
        if (this.target.write(px, py, depth, color)) written++;
      }
    }
    return written;
  }

  private toScreen(v: VertexOutput): ScreenVertex | null {
    const [x, y, z, w] = v.clipPosition;
    if (!(w > 0)) return null;
    const invW = 1 / w;
    const ndcX = x * invW;
    const ndcY = y * invW;
    return {
      x: (ndcX * 0.5 + 0.5) * this.target.width,
      y: (0.5 - ndcY * 0.5) * this.target.height,
      z: z * invW,
      invW,
      ndcX,
      ndcY,
    };
  }
}

function edge(a: ScreenVertex, b: ScreenVertex, px: number, py: number): number {
  return (b.x - a.x) * (py - a.y) - (b.y - a.y) * (px - a.x);
}
