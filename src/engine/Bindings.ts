// Bindings — the bind group / vertex attribute contract of the model pipeline.
//
//   group 0   binding 0–1  diffuse texture + sampler       (COLOR_MAP)
//             binding 2–3  normal-map texture + sampler    (NORMAL_MAP)
//   group 1   binding 0    camera uniform                  (always)
//   group 2   binding 0    light uniform                   (always)
//
// Group numbers and binding indices are part of the shader's interface and
// must not move. A resource set that disagrees with the compiled features is
// rejected here, before anything is bound.

import type { ShaderFeatures } from "./Features";
import { featureLabel } from "./Features";
import type { Sampler, Texture } from "./Texture";

export const TEXTURE_GROUP = 0;
export const CAMERA_GROUP = 1;
export const LIGHT_GROUP = 2;

export const DIFFUSE_TEXTURE_BINDING = 0;
export const DIFFUSE_SAMPLER_BINDING = 1;
export const NORMAL_TEXTURE_BINDING = 2;
export const NORMAL_SAMPLER_BINDING = 3;

/** Size in bytes of the camera uniform: view_pos vec4 + view mat4 + proj mat4. */
export const CAMERA_UNIFORM_SIZE = 144;
/** Size in bytes of the light uniform: position vec3 + pad, color vec3 + pad. */
export const LIGHT_UNIFORM_SIZE = 32;

// GPUShaderStage flag values; the global is only defined inside a WebGPU host.
const STAGE_VERTEX: GPUShaderStageFlags = 0x1;
const STAGE_FRAGMENT: GPUShaderStageFlags = 0x2;

export class BindingMismatchError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "BindingMismatchError";
  }
}

export interface TextureBinding {
  texture: Texture;
  sampler: Sampler;
}

/** Optional group 0 resources. `B` is a CPU texture binding or a GPU view/sampler pair. */
export interface SurfaceBindings<B = TextureBinding> {
  diffuse?: B;
  normalMap?: B;
}

export type ColorSource<B = TextureBinding> = { kind: "color-map"; binding: B } | { kind: "white" };

export type NormalSource<B = TextureBinding> = { kind: "normal-map"; binding: B } | { kind: "vertex-normal" };

export interface ResolvedSurface<B = TextureBinding> {
  color: ColorSource<B>;
  normal: NormalSource<B>;
}

/**
 * Checks a surface resource set against the compiled features and returns
 * the color/normal sources the fragment stage will read from.
 */
export function resolveSurfaceBindings<B>(features: ShaderFeatures, bindings: SurfaceBindings<B>): ResolvedSurface<B> {
  const variant = featureLabel(features);
  let color: ColorSource<B> = { kind: "white" };
  let normal: NormalSource<B> = { kind: "vertex-normal" };

  if (features.colorMap) {
    if (bindings.diffuse === undefined) throw new BindingMismatchError(`Variant ${variant} requires a diffuse texture at group 0, binding 0–1`);
    color = { kind: "color-map", binding: bindings.diffuse };
  } else if (bindings.diffuse !== undefined) {
    throw new BindingMismatchError(`Variant ${variant} has no diffuse texture slot but one was bound`);
  }

  if (features.normalMap) {
    if (bindings.normalMap === undefined) throw new BindingMismatchError(`Variant ${variant} requires a normal map at group 0, binding 2–3`);
    normal = { kind: "normal-map", binding: bindings.normalMap };
  } else if (bindings.normalMap !== undefined) {
    throw new BindingMismatchError(`Variant ${variant} has no normal map slot but one was bound`);
  }

  return { color, normal };
}

/** Group 0 layout entries for a feature set. Empty when neither map is compiled in. */
export function textureLayoutEntries(features: ShaderFeatures): GPUBindGroupLayoutEntry[] {
  const entries: GPUBindGroupLayoutEntry[] = [];
  if (features.colorMap) {
    entries.push(
      { binding: DIFFUSE_TEXTURE_BINDING, visibility: STAGE_FRAGMENT, texture: { sampleType: "float" } },
      { binding: DIFFUSE_SAMPLER_BINDING, visibility: STAGE_FRAGMENT, sampler: { type: "filtering" } },
    );
  }
  if (features.normalMap) {
    entries.push(
      { binding: NORMAL_TEXTURE_BINDING, visibility: STAGE_FRAGMENT, texture: { sampleType: "float" } },
      { binding: NORMAL_SAMPLER_BINDING, visibility: STAGE_FRAGMENT, sampler: { type: "filtering" } },
    );
  }
  return entries;
}

export function cameraLayoutEntries(): GPUBindGroupLayoutEntry[] {
  return [
    {
      binding: 0,
      visibility: STAGE_VERTEX | STAGE_FRAGMENT,
      buffer: { type: "uniform", minBindingSize: CAMERA_UNIFORM_SIZE },
    },
  ];
}

export function lightLayoutEntries(): GPUBindGroupLayoutEntry[] {
  return [
    {
      binding: 0,
      visibility: STAGE_VERTEX | STAGE_FRAGMENT,
      buffer: { type: "uniform", minBindingSize: LIGHT_UNIFORM_SIZE },
    },
  ];
}

/** Layout entries for groups 0, 1, 2 in order. */
export function bindGroupLayoutEntries(
  features: ShaderFeatures,
): [GPUBindGroupLayoutEntry[], GPUBindGroupLayoutEntry[], GPUBindGroupLayoutEntry[]] {
  return [textureLayoutEntries(features), cameraLayoutEntries(), lightLayoutEntries()];
}
