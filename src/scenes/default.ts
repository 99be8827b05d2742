/**
 * Default scene - a matte sphere on a matte ground, between a brushed and a
 * polished metal sphere.
 */

import { materials } from "../material";
import { DEFAULT_CAMERA, registerScene, type ScenePreset } from "../scene";

export const defaultScene: ScenePreset = {
  name: "default",
  description: "Matte sphere on a matte ground between two metal spheres",
  build: () => ({
    name: "default",
    camera: DEFAULT_CAMERA,
    spheres: [
      { center: [0, 0, -1], radius: 0.5, material: materials.diffuse([0.5, 0.5, 0.5]) },
      { center: [0, -100.5, -1], radius: 100, material: materials.diffuse([0.5, 0.5, 0.5]) },
      { center: [1, 0, -1], radius: 0.5, material: materials.metal([0.8, 0.6, 0.2], 0.6) },
      { center: [-1, 0, -1], radius: 0.5, material: materials.metal([0.8, 0.8, 0.8], 0) },
    ],
  }),
};

registerScene(defaultScene);
