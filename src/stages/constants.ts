// Lighting constants shared by the WGSL source and the CPU evaluator.
// Both are fixed for this pipeline; the shader inlines the same values.

export const AMBIENT_STRENGTH = 0.1;
export const SPECULAR_EXPONENT = 4.0;
