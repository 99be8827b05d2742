import { describe, test, expect } from "vitest";
import { Sphere, World } from "./hittable";
import { materials } from "./material";
import { ray } from "./ray";
import { background, color } from "./tracer";
import { seededRandom } from "./scene/utils";

describe("background", () => {
  test("is white looking straight down and sky blue straight up", () => {
    expect(background(ray([0, 0, 0], [0, -1, 0]))).toEqual([1, 1, 1]);
    expect(background(ray([0, 0, 0], [0, 3, 0]))).toEqual([0.5, 0.7, 1.0]);
  });

  test("is halfway at the horizon", () => {
    const c = background(ray([0, 0, 0], [1, 0, 0]));
    expect(c[0]).toBeCloseTo(0.75);
    expect(c[1]).toBeCloseTo(0.85);
    expect(c[2]).toBeCloseTo(1.0);
  });
});

describe("color", () => {
  const rng = seededRandom(3);

  test("empty world returns the background for any ray", () => {
    const world = new World();
    for (const dir of [[0.3, -0.2, -1], [-1, 0.9, 0.1], [0, 0, 1]] as const) {
      const r = ray([1, 2, 3], dir);
      expect(color(r, world, 50, rng)).toEqual(background(r));
    }
  });

  test("returns black once the bounce budget is spent", () => {
    const world = new World([new Sphere([0, 0, -1], 0.5, materials.diffuse([1, 1, 1]))]);

    expect(color(ray([0, 0, 0], [0, 0, -1]), world, 0, rng)).toEqual([0, 0, 0]);
    expect(color(ray([0, 0, 0], [0, 1, 0]), new World(), 0, rng)).toEqual([0, 0, 0]);
  });

  test("a single bounce on a surface yields black", () => {
    const world = new World([new Sphere([0, 0, -1], 0.5, materials.diffuse([1, 1, 1]))]);

    expect(color(ray([0, 0, 0], [0, 0, -1]), world, 1, rng)).toEqual([0, 0, 0]);
  });

  test("attenuates the sky seen after one diffuse bounce", () => {
    // Hit the bottom of the sphere; with a centered draw the bounce goes straight down.
    const world = new World([new Sphere([0, 10, 0], 10, materials.diffuse([0.25, 0.25, 0.25]))]);

    expect(color(ray([0, -5, 0], [0, 1, 0]), world, 50, () => 0.5)).toEqual([0.25, 0.25, 0.25]);
  });

  test("a metal that absorbs the scattered ray contributes nothing", () => {
    // Grazing hit at (0, 0, 1); full fuzz with offset (0, 0, -0.9) points the bounce into the sphere.
    const world = new World([new Sphere([0, 0, 0], 1, materials.metal([1, 1, 1], 1))]);
    const draws = [0.5, 0.5, 0.05];
    let i = 0;
    const rng = () => draws[i++ % draws.length] ?? 0.5;

    expect(color(ray([-1, 0, 1.01], [1, 0, -0.01]), world, 50, rng)).toEqual([0, 0, 0]);
  });

  test("black albedo returns black", () => {
    const world = new World([new Sphere([0, 0, -1], 0.5, materials.diffuse([0, 0, 0]))]);

    expect(color(ray([0, 0, 0], [0, 0, -1]), world, 50, rng)).toEqual([0, 0, 0]);
  });
});
