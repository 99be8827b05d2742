/**
 * Scene files: JSON in, validated SceneDescription out.
 */

import { readFileSync } from "fs";
import type { Vec3 } from "../math";
import type { Material } from "../material";
import { DEFAULT_CAMERA, type CameraDef, type SceneDescription, type SphereDef } from "./types";

export class SceneError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SceneError";
  }
}

// Validation helpers
function isFiniteNumber(v: unknown): v is number {
  return typeof v === "number" && Number.isFinite(v);
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function readVec3(v: unknown, path: string): Vec3 {
  if (!Array.isArray(v) || v.length !== 3) {
    throw new SceneError(`${path} must be an array of 3 numbers`);
  }
  const [x, y, z] = v;
  if (!isFiniteNumber(x) || !isFiniteNumber(y) || !isFiniteNumber(z)) {
    throw new SceneError(`${path} must contain only finite numbers`);
  }
  return [x, y, z];
}

function readNumber(v: unknown, path: string): number {
  if (!isFiniteNumber(v)) throw new SceneError(`${path} must be a finite number`);
  return v;
}

function readMaterial(v: unknown, path: string): Material {
  if (!isRecord(v)) throw new SceneError(`${path} must be an object`);

  const albedo = readVec3(v.albedo, `${path}.albedo`);
  switch (v.type) {
    case "diffuse":
      return { type: "diffuse", albedo };
    case "metal": {
      const fuzz = v.fuzz === undefined ? 0 : readNumber(v.fuzz, `${path}.fuzz`);
      if (fuzz < 0 || fuzz > 1) throw new SceneError(`${path}.fuzz must be within [0, 1]`);
      return { type: "metal", albedo, fuzz };
    }
    default:
      throw new SceneError(`${path}.type must be "diffuse" or "metal"`);
  }
}

function readSphere(v: unknown, path: string): SphereDef {
  if (!isRecord(v)) throw new SceneError(`${path} must be an object`);

  const radius = readNumber(v.radius, `${path}.radius`);
  if (radius <= 0) throw new SceneError(`${path}.radius must be > 0`);

  return {
    center: readVec3(v.center, `${path}.center`),
    radius,
    material: readMaterial(v.material, `${path}.material`),
  };
}

function readCamera(v: unknown): CameraDef {
  if (v === undefined) return DEFAULT_CAMERA;
  if (!isRecord(v)) throw new SceneError("camera must be an object");

  return {
    eye: v.eye === undefined ? DEFAULT_CAMERA.eye : readVec3(v.eye, "camera.eye"),
    at: v.at === undefined ? DEFAULT_CAMERA.at : readVec3(v.at, "camera.at"),
    up: v.up === undefined ? DEFAULT_CAMERA.up : readVec3(v.up, "camera.up"),
    fov: v.fov === undefined ? DEFAULT_CAMERA.fov : readNumber(v.fov, "camera.fov"),
  };
}

/** Validates parsed JSON; throws SceneError naming the first bad field. */
export function parseScene(json: unknown, name: string = "scene"): SceneDescription {
  if (!isRecord(json)) throw new SceneError("scene must be a JSON object");
  if (!Array.isArray(json.spheres)) throw new SceneError("spheres must be an array");

  return {
    name: typeof json.name === "string" ? json.name : name,
    camera: readCamera(json.camera),
    spheres: json.spheres.map((s: unknown, i) => readSphere(s, `spheres[${i}]`)),
  };
}

export function loadSceneFile(path: string): SceneDescription {
  const content = readFileSync(path, "utf-8");
  let json: unknown;
  try {
    json = JSON.parse(content);
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new SceneError(`${path} is not valid JSON: ${msg}`);
  }
  return parseScene(json, path);
}
