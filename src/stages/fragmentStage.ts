// fragmentStage — CPU evaluation of the `fs_main` entry point.
//
// The color and normal sources are resolved once, when the stage is created,
// from the same feature set the WGSL variant is composed with. The returned
// function never looks at which variant it belongs to.

import { vec3, vec4 } from "gl-matrix";
import type { ReadonlyVec3, ReadonlyVec4 } from "gl-matrix";
import { resolveSurfaceBindings } from "../engine/Bindings";
import type { ColorSource, NormalSource, SurfaceBindings } from "../engine/Bindings";
import type { ShaderFeatures } from "../engine/Features";
import { AMBIENT_STRENGTH, SPECULAR_EXPONENT } from "./constants";
import type { FragmentInput, LightUniform } from "./types";

export type FragmentStage = (input: FragmentInput, light: LightUniform) => vec4;

/** Reads the surface normal used for lighting. xyz is the normal, w is the sample's alpha. */
export type NormalReader = (input: FragmentInput) => vec4;

export type ColorReader = (input: FragmentInput) => vec4;

export interface BlinnPhongTerms {
  ambient: vec3;
  diffuse: vec3;
  specular: vec3;
}

export function createNormalReader(source: NormalSource): NormalReader {
  switch (source.kind) {
    case "normal-map": {
      const { texture, sampler } = source.binding;
      return (input) => {
        const texel = sampler.sample(texture, input.texCoords);
        return vec4.fromValues(texel[0] * 2 - 1, texel[1] * 2 - 1, texel[2] * 2 - 1, texel[3]);
      };
    }
    case "vertex-normal":
      // No tangent-encoded sample exists, so the interpolated world normal is
      // used as-is: not decoded, not renormalized.
      return (input) => vec4.fromValues(input.worldNormal[0], input.worldNormal[1], input.worldNormal[2], 1);
  }
}

export function createColorReader(source: ColorSource): ColorReader {
  switch (source.kind) {
    case "color-map": {
      const { texture, sampler } = source.binding;
      return (input) => sampler.sample(texture, input.texCoords);
    }
    case "white":
      return () => vec4.fromValues(1, 1, 1, 1);
  }
}

/** The three Blinn-Phong terms for one fragment, before modulation by the surface color. */
export function blinnPhong(input: FragmentInput, light: LightUniform, normal: ReadonlyVec3): BlinnPhongTerms {
  const ambient = vec3.scale(vec3.create(), light.color, AMBIENT_STRENGTH);

  const lightDir = vec3.subtract(vec3.create(), input.tangentLightPosition, input.tangentPosition);
  vec3.normalize(lightDir, lightDir);
  const viewDir = vec3.subtract(vec3.create(), input.tangentViewPosition, input.tangentPosition);
  vec3.normalize(viewDir, viewDir);
  const halfDir = vec3.add(vec3.create(), viewDir, lightDir);
  vec3.normalize(halfDir, halfDir);

  const diffuseStrength = Math.max(vec3.dot(normal, lightDir), 0);
  const diffuse = vec3.scale(vec3.create(), light.color, diffuseStrength);

  const specularStrength = Math.pow(Math.max(vec3.dot(normal, halfDir), 0), SPECULAR_EXPONENT);
  const specular = vec3.scale(vec3.create(), light.color, specularStrength);

  return { ambient, diffuse, specular };
}

/** (ambient + diffuse + specular) × color.rgb, with color's alpha carried through. */
export function composeColor(terms: BlinnPhongTerms, color: ReadonlyVec4): vec4 {
  const light = vec3.add(vec3.create(), terms.ambient, terms.diffuse);
  vec3.add(light, light, terms.specular);
  return vec4.fromValues(light[0] * color[0], light[1] * color[1], light[2] * color[2], color[3]);
}

export function createFragmentStage(features: ShaderFeatures, bindings: SurfaceBindings = {}): FragmentStage {
  const surface = resolveSurfaceBindings(features, bindings);
  const readColor = createColorReader(surface.color);
  const readNormal = createNormalReader(surface.normal);

  return (input, light) => {
    const color = readColor(input);
    const objectNormal = readNormal(input);
    const normal = vec3.fromValues(objectNormal[0], objectNormal[1], objectNormal[2]);
    return composeColor(blinnPhong(input, light, normal), color);
  };
}
