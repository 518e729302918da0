export * from "./engine";
export * from "./stages";
export { MODEL_SHADER } from "./shaders/model.wgsl";
export { computeTangents } from "./tangents";
export { createQuad } from "./geometry";
export { checkerTexture, bevelNormalMap } from "./proceduralTextures";
