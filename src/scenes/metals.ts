/**
 * Metals scene - a tinted matte sphere between a rough and a polished metal one.
 */

import { materials } from "../material";
import { registerScene, type ScenePreset } from "../scene";

export const metalsScene: ScenePreset = {
  name: "metals",
  description: "Matte sphere flanked by rough and polished metal spheres",
  build: () => ({
    name: "metals",
    camera: {
      eye: [-2, 2, 1],
      at: [0, 0, -1],
      up: [0, 1, 0],
      fov: 50,
    },
    spheres: [
      { center: [0, 0, -1], radius: 0.5, material: materials.diffuse([0.8, 0.3, 0.3]) },
      { center: [0, -100.5, -1], radius: 100, material: materials.diffuse([0.8, 0.8, 0.0]) },
      { center: [1, 0, -1], radius: 0.5, material: materials.metal([0.8, 0.6, 0.2], 1.0) },
      { center: [-1, 0, -1], radius: 0.5, material: materials.metal([0.8, 0.8, 0.8], 0.3) },
    ],
  }),
};

registerScene(metalsScene);
