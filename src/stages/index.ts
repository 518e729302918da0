export { runVertexStage, tangentBasis, transformDirection } from "./vertexStage";
export {
  createFragmentStage,
  createNormalReader,
  createColorReader,
  blinnPhong,
  composeColor,
} from "./fragmentStage";
export type { FragmentStage, NormalReader, ColorReader, BlinnPhongTerms } from "./fragmentStage";
export { AMBIENT_STRENGTH, SPECULAR_EXPONENT } from "./constants";
export type { CameraUniform, LightUniform, VertexInput, InstanceInput, VertexOutput, FragmentInput } from "./types";
