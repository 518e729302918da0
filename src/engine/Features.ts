// Features — the compile-time toggles that pick a shader variant.
//
// A feature set maps 1:1 onto the shader defines the WGSL source tests with
// `#ifdef`. Every combination is a separate pipeline; nothing is branched on
// at draw time.

export const SHADER_DEFS = ["COLOR_MAP", "NORMAL_MAP"] as const;

export type ShaderDef = (typeof SHADER_DEFS)[number];

export interface ShaderFeatures {
  readonly colorMap: boolean;
  readonly normalMap: boolean;
}

export function shaderDefsFor(features: ShaderFeatures): ShaderDef[] {
  const defs: ShaderDef[] = [];
  if (features.colorMap) defs.push("COLOR_MAP");
  if (features.normalMap) defs.push("NORMAL_MAP");
  return defs;
}

export function featuresFromDefs(defs: readonly string[]): ShaderFeatures {
  for (const def of defs) {
    if (!isShaderDef(def)) throw new Error(`Unknown shader def "${def}"`);
  }
  return {
    colorMap: defs.includes("COLOR_MAP"),
    normalMap: defs.includes("NORMAL_MAP"),
  };
}

export function isShaderDef(name: string): name is ShaderDef {
  return SHADER_DEFS.some((def) => def === name);
}

/** Stable label for a feature set, e.g. "COLOR_MAP+NORMAL_MAP" or "none". */
export function featureLabel(features: ShaderFeatures): string {
  const defs = shaderDefsFor(features);
  return defs.length > 0 ? defs.join("+") : "none";
}

/** All four variants, in a fixed order. */
export function allFeatureSets(): ShaderFeatures[] {
  return [
    { colorMap: false, normalMap: false },
    { colorMap: true, normalMap: false },
    { colorMap: false, normalMap: true },
    { colorMap: true, normalMap: true },
  ];
}
