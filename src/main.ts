// main.ts — command-line demo. Builds a small scene of instanced, textured
// quads, renders it through the reference rasterizer and writes a PPM.
//
//   npm run demo -- --color-map --normal-map --out quads.ppm
//
// Options:
//   --width, --height   framebuffer size (default 256×256)
//   --color-map         compile the COLOR_MAP variant (checkerboard albedo)
//   --normal-map        compile the NORMAL_MAP variant (beveled tiles)
//   --instances N       number of quads in the row (default 3)
//   --light-color r,g,b point light intensity (default 1,1,1)
//   --out FILE          output path (default render.ppm)
//   --print-shader      print the composed WGSL for the variant and exit

import { writeFile } from "node:fs/promises";
import { parseArgs } from "node:util";
import { quat, vec3 } from "gl-matrix";
import {
  Framebuffer,
  Instance,
  Light,
  MODEL_SHADER_NAME,
  OrbitCamera,
  Sampler,
  Scene,
  ShaderComposer,
  ensureModelShader,
  featureLabel,
  shaderDefsFor,
} from "./engine";
import type { ShaderFeatures, SurfaceBindings } from "./engine";
import { createQuad } from "./geometry";
import { bevelNormalMap, checkerTexture } from "./proceduralTextures";

interface DemoOptions {
  width: number;
  height: number;
  features: ShaderFeatures;
  instances: number;
  lightColor: vec3;
  out: string;
  printShader: boolean;
}

function parsePositiveInt(name: string, value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n <= 0) throw new Error(`--${name} must be a positive integer, got "${value}"`);
  return n;
}

function parseColor(value: string): vec3 {
  const parts = value.split(",").map(Number);
  if (parts.length !== 3 || parts.some((c) => !Number.isFinite(c) || c < 0)) {
    throw new Error(`--light-color must be three non-negative numbers "r,g,b", got "${value}"`);
  }
  return vec3.fromValues(parts[0], parts[1], parts[2]);
}

function readOptions(argv: string[]): DemoOptions {
  const { values } = parseArgs({
    args: argv,
    options: {
      width: { type: "string" },
      height: { type: "string" },
      "color-map": { type: "boolean" },
      "normal-map": { type: "boolean" },
      instances: { type: "string" },
      "light-color": { type: "string" },
      out: { type: "string" },
      "print-shader": { type: "boolean" },
    },
  });

  return {
    width: parsePositiveInt("width", values.width ?? "256"),
    height: parsePositiveInt("height", values.height ?? "256"),
    features: { colorMap: values["color-map"] ?? false, normalMap: values["normal-map"] ?? false },
    instances: parsePositiveInt("instances", values.instances ?? "3"),
    lightColor: parseColor(values["light-color"] ?? "1,1,1"),
    out: values.out ?? "render.ppm",
    printShader: values["print-shader"] ?? false,
  };
}

/** Quads spaced along X, each turned a little further towards the light. */
function rowOfInstances(count: number): Instance[] {
  const instances: Instance[] = [];
  const spacing = 2.2;
  for (let i = 0; i < count; i++) {
    const x = (i - (count - 1) / 2) * spacing;
    const rotation = quat.setAxisAngle(quat.create(), [1, 0, 0], -0.3 * i);
    instances.push(Instance.fromTransform([x, 0, 0], rotation));
  }
  return instances;
}

async function main() {
  const options = readOptions(process.argv.slice(2));
  const variant = featureLabel(options.features);

  if (options.printShader) {
    const composer = new ShaderComposer();
    ensureModelShader(composer);
    console.log(composer.compose(MODEL_SHADER_NAME, shaderDefsFor(options.features)));
    return;
  }

  const sampler = new Sampler({ addressModeU: "repeat", addressModeV: "repeat", magFilter: "linear" });
  const bindings: SurfaceBindings = {};
  if (options.features.colorMap) bindings.diffuse = { texture: checkerTexture(), sampler };
  if (options.features.normalMap) bindings.normalMap = { texture: bevelNormalMap(), sampler };

  const orbit = new OrbitCamera();
  orbit.theta = 0;
  orbit.phi = Math.PI / 2 - 0.2;
  orbit.radius = 4 + options.instances * 1.5;
  const camera = orbit.camera(options.width / options.height);
  const light = new Light([0, 3, 3], options.lightColor);

  const scene = new Scene(camera, light);
  scene.add({ mesh: createQuad(1), instances: rowOfInstances(options.instances), features: options.features, bindings });

  const target = new Framebuffer(options.width, options.height, [0.02, 0.02, 0.03, 1]);
  const stats = scene.render(target);
  console.log(`Variant ${variant}: ${stats.triangles} triangles, ${stats.culled} culled, ${stats.fragments} fragments`);

  await writeFile(options.out, target.toPPM());
  console.log(`Wrote ${options.width}x${options.height} image to ${options.out}`);
}

main().catch((err) => {
  console.error(err);
  process.exitCode = 1;
});
