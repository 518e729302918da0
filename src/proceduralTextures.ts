// Procedural textures for the demo: a checkerboard albedo and a normal map
// with beveled tile edges, both RGBA8.

import { Texture } from "./engine/Texture";

export function checkerTexture(size = 64, tileSize = 8): Texture {
  const data = new Uint8Array(size * size * 4);
  for (let row = 0; row < size; row++) {
    for (let col = 0; col < size; col++) {
      const i = (row * size + col) * 4;
      const v = (Math.floor(row / tileSize) + Math.floor(col / tileSize)) % 2 === 0 ? 220 : 80;
      data[i] = v;
      data[i + 1] = v;
      data[i + 2] = v;
      data[i + 3] = 255;
    }
  }
  return new Texture({ width: size, height: size, data });
}

export function bevelNormalMap(size = 64, tileSize = 8, bevel = 2): Texture {
  const data = new Uint8Array(size * size * 4);
  for (let row = 0; row < size; row++) {
    for (let col = 0; col < size; col++) {
      const i = (row * size + col) * 4;
      const tx = col % tileSize;
      const ty = row % tileSize;
      let nx = 0, ny = 0, nz = 1;
      if (tx < bevel) nx = -0.7;
      else if (tx >= tileSize - bevel) nx = 0.7;
      if (ty < bevel) ny = 0.7;
      else if (ty >= tileSize - bevel) ny = -0.7;
      const len = Math.sqrt(nx * nx + ny * ny + nz * nz);
      data[i] = Math.round((nx / len * 0.5 + 0.5) * 255);
      data[i + 1] = Math.round((ny / len * 0.5 + 0.5) * 255);
      data[i + 2] = Math.round((nz / len * 0.5 + 0.5) * 255);
      data[i + 3] = 255;
    }
  }
  return new Texture({ width: size, height: size, data });
}
