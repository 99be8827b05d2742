/**
 * Field scene - a seeded grid of small spheres bobbing on noise above the ground.
 */

import type { Vec3 } from "../math";
import { materials, type Material } from "../material";
import { registerScene, type SceneDescription, type ScenePreset, type SphereDef } from "../scene";
import { createNoiseGenerator, seededRandom } from "../scene/utils";

// =============================================================================
// Config
// =============================================================================

const fieldParams = {
  gridSize: 5,
  spacing: 0.9,
  radius: 0.2,
  centerZ: -3,
  heightAmount: 0.25,
  noiseScale: 0.7,
  metalChance: 0.35,
};

const GROUND_ALBEDO: Vec3 = [0.5, 0.5, 0.5];

function randomAlbedo(rng: () => number, floor: number): Vec3 {
  return [floor + (1 - floor) * rng(), floor + (1 - floor) * rng(), floor + (1 - floor) * rng()];
}

// =============================================================================
// Scene Implementation
// =============================================================================

function build(seed: number): SceneDescription {
  const rng = seededRandom(seed);
  const pnoise1 = createNoiseGenerator(rng);
  const { gridSize, spacing, radius, centerZ, heightAmount, noiseScale, metalChance } = fieldParams;

  const half = ((gridSize - 1) / 2) * spacing;
  const spheres: SphereDef[] = [
    { center: [0, -1000, centerZ], radius: 1000, material: materials.diffuse(GROUND_ALBEDO) },
  ];

  for (let row = 0; row < gridSize; row++) {
    for (let col = 0; col < gridSize; col++) {
      const x = col * spacing - half;
      const z = centerZ + row * spacing - half;
      const lift = (pnoise1((x + z) * noiseScale, 2) + 1) * 0.5 * heightAmount;

      const material: Material =
        rng() < metalChance
          ? materials.metal(randomAlbedo(rng, 0.5), 0.5 * rng())
          : materials.diffuse(randomAlbedo(rng, 0.1));

      spheres.push({ center: [x, radius + lift, z], radius, material });
    }
  }

  return {
    name: "field",
    camera: {
      eye: [0, 1.6, 1.5],
      at: [0, 0.2, centerZ],
      up: [0, 1, 0],
      fov: 45,
    },
    spheres,
  };
}

// =============================================================================
// Export
// =============================================================================

export const fieldScene: ScenePreset = {
  name: "field",
  description: "Seeded grid of small matte and metal spheres",
  build,
};

registerScene(fieldScene);
