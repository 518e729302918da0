export { Camera, CAMERA_UNIFORM_FLOATS } from "./Camera";
export type { PerspectiveOptions } from "./Camera";
export { OrbitCamera } from "./OrbitCamera";
export { Light, LIGHT_UNIFORM_FLOATS } from "./Light";
export { Instance, INSTANCE_FLOATS, packInstances, unpackInstance } from "./Instance";
export {
  Mesh,
  FLOATS_PER_VERTEX,
  VERTEX_ATTRIBUTES,
  INSTANCE_ATTRIBUTES,
  VERTEX_BUFFER_LAYOUT,
  INSTANCE_BUFFER_LAYOUT,
  bufferLayout,
} from "./Mesh";
export type { VertexAttribute } from "./Mesh";
export { Texture, Sampler } from "./Texture";
export type { TextureOptions, SamplerOptions } from "./Texture";
export { SHADER_DEFS, shaderDefsFor, featuresFromDefs, featureLabel, allFeatureSets, isShaderDef } from "./Features";
export type { ShaderDef, ShaderFeatures } from "./Features";
export {
  BindingMismatchError,
  resolveSurfaceBindings,
  bindGroupLayoutEntries,
  textureLayoutEntries,
  cameraLayoutEntries,
  lightLayoutEntries,
  TEXTURE_GROUP,
  CAMERA_GROUP,
  LIGHT_GROUP,
  CAMERA_UNIFORM_SIZE,
  LIGHT_UNIFORM_SIZE,
} from "./Bindings";
export type { TextureBinding, SurfaceBindings, ColorSource, NormalSource, ResolvedSurface } from "./Bindings";
export { ShaderComposer, ShaderCompositionError, preprocess } from "./ShaderComposer";
export type { ComposableModule, ComposableModuleDescriptor } from "./ShaderComposer";
export { ModelPipeline, MODEL_SHADER_NAME, ensureModelShader } from "./ModelPipeline";
export type { PipelineDevice, GPUTextureBinding, ModelPipelineOptions } from "./ModelPipeline";
export { Framebuffer } from "./Framebuffer";
export { Rasterizer, interpolateOutputs } from "./Rasterizer";
export type { CullMode, DrawStats, RasterizerOptions } from "./Rasterizer";
export { Scene } from "./Scene";
export type { Draw } from "./Scene";
