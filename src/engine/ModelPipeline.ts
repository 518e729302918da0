// ModelPipeline — builds the WebGPU render pipeline for one feature set.
//
// The WGSL variant is composed from the define-gated model shader, then the
// bind group layouts are created in group order (textures, camera, light).
// Textures are validated against the compiled features before a bind group
// is created, so an inconsistent resource set never reaches the GPU.

import { MODEL_SHADER } from "../shaders/model.wgsl";
import {
  BindingMismatchError,
  CAMERA_UNIFORM_SIZE,
  DIFFUSE_SAMPLER_BINDING,
  DIFFUSE_TEXTURE_BINDING,
  LIGHT_UNIFORM_SIZE,
  NORMAL_SAMPLER_BINDING,
  NORMAL_TEXTURE_BINDING,
  bindGroupLayoutEntries,
  resolveSurfaceBindings,
} from "./Bindings";
import type { SurfaceBindings } from "./Bindings";
import { SHADER_DEFS, featureLabel, shaderDefsFor } from "./Features";
import type { ShaderFeatures } from "./Features";
import { INSTANCE_BUFFER_LAYOUT, VERTEX_BUFFER_LAYOUT } from "./Mesh";
import { ShaderComposer } from "./ShaderComposer";

export const MODEL_SHADER_NAME = "model";

/** The device calls the pipeline needs; any GPUDevice satisfies it. */
export type PipelineDevice = Pick<
  GPUDevice,
  "createShaderModule" | "createBindGroupLayout" | "createPipelineLayout" | "createRenderPipeline" | "createBindGroup"
>;

export interface GPUTextureBinding {
  view: GPUTextureView;
  sampler: GPUSampler;
}

export interface ModelPipelineOptions {
  format: GPUTextureFormat;
  features: ShaderFeatures;
  depthFormat?: GPUTextureFormat;
  composer?: ShaderComposer;
}

/** Registers the model shader with `composer` unless it is already there. */
export function ensureModelShader(composer: ShaderComposer): void {
  if (!composer.hasModule(MODEL_SHADER_NAME)) {
    composer.addComposableModule({ name: MODEL_SHADER_NAME, source: MODEL_SHADER, shaderDefs: SHADER_DEFS });
  }
}

export class ModelPipeline {
  readonly features: ShaderFeatures;
  readonly code: string;
  readonly pipeline: GPURenderPipeline;
  readonly bindGroupLayouts: readonly [GPUBindGroupLayout, GPUBindGroupLayout, GPUBindGroupLayout];
  private device: PipelineDevice;

  private constructor(
    device: PipelineDevice,
    features: ShaderFeatures,
    code: string,
    pipeline: GPURenderPipeline,
    bindGroupLayouts: readonly [GPUBindGroupLayout, GPUBindGroupLayout, GPUBindGroupLayout],
  ) {
    this.device = device;
    this.features = features;
    this.code = code;
    this.pipeline = pipeline;
    this.bindGroupLayouts = bindGroupLayouts;
  }

  static create(device: PipelineDevice, options: ModelPipelineOptions): ModelPipeline {
    const { features, format } = options;
    const label = `model[${featureLabel(features)}]`;

    const composer = options.composer ?? new ShaderComposer();
    ensureModelShader(composer);
    const code = composer.compose(MODEL_SHADER_NAME, shaderDefsFor(features));
    const module = device.createShaderModule({ label, code });

    const [textureEntries, cameraEntries, lightEntries] = bindGroupLayoutEntries(features);
    const bindGroupLayouts = [
      device.createBindGroupLayout({ label: `${label} textures`, entries: textureEntries }),
      device.createBindGroupLayout({ label: `${label} camera`, entries: cameraEntries }),
      device.createBindGroupLayout({ label: `${label} light`, entries: lightEntries }),
    ] as const;

    const pipeline = device.createRenderPipeline({
      label,
      layout: device.createPipelineLayout({ label, bindGroupLayouts: [...bindGroupLayouts] }),
      vertex: {
        module,
        entryPoint: "vs_main",
        buffers: [VERTEX_BUFFER_LAYOUT, INSTANCE_BUFFER_LAYOUT],
      },
      fragment: {
        module,
        entryPoint: "fs_main",
        targets: [{ format }],
      },
      primitive: { topology: "triangle-list", frontFace: "ccw", cullMode: "back" },
      depthStencil: {
        format: options.depthFormat ?? "depth32float",
        depthWriteEnabled: true,
        depthCompare: "less",
      },
    });

    return new ModelPipeline(device, features, code, pipeline, bindGroupLayouts);
  }

  /** Group 0. Throws BindingMismatchError when `bindings` disagree with the compiled features. */
  createSurfaceBindGroup(bindings: SurfaceBindings<GPUTextureBinding>): GPUBindGroup {
    const surface = resolveSurfaceBindings(this.features, bindings);
    const entries: GPUBindGroupEntry[] = [];
    if (surface.color.kind === "color-map") {
      entries.push(
        { binding: DIFFUSE_TEXTURE_BINDING, resource: surface.color.binding.view },
        { binding: DIFFUSE_SAMPLER_BINDING, resource: surface.color.binding.sampler },
      );
    }
    if (surface.normal.kind === "normal-map") {
      entries.push(
        { binding: NORMAL_TEXTURE_BINDING, resource: surface.normal.binding.view },
        { binding: NORMAL_SAMPLER_BINDING, resource: surface.normal.binding.sampler },
      );
    }
    return this.device.createBindGroup({ label: "model textures", layout: this.bindGroupLayouts[0], entries });
  }

  /** Group 1, over a host-owned buffer holding Camera.toUniformData(). */
  createCameraBindGroup(buffer: GPUBuffer): GPUBindGroup {
    return this.createUniformBindGroup(1, buffer, CAMERA_UNIFORM_SIZE, "camera");
  }

  /** Group 2, over a host-owned buffer holding Light.toUniformData(). */
  createLightBindGroup(buffer: GPUBuffer): GPUBindGroup {
    return this.createUniformBindGroup(2, buffer, LIGHT_UNIFORM_SIZE, "light");
  }

  private createUniformBindGroup(group: 1 | 2, buffer: GPUBuffer, minSize: number, name: string): GPUBindGroup {
    if (buffer.size < minSize) {
      throw new BindingMismatchError(`The ${name} uniform buffer holds ${buffer.size} bytes, expected at least ${minSize}`);
    }
    return this.device.createBindGroup({
      label: `model ${name}`,
      layout: this.bindGroupLayouts[group],
      entries: [{ binding: 0, resource: { buffer } }],
    });
  }
}
