import { describe, test, expect } from "vitest";
import { Bitmap } from "./bitmap";
import { Camera } from "./camera";
import { Sphere, World } from "./hittable";
import { materials } from "./material";
import { packColor, renderBand, renderFrame, samplePixel, toDisplay, unpackColor } from "./render";
import { background } from "./tracer";

const zero = () => 0;

describe("toDisplay", () => {
  test("applies gamma 2 and truncates", () => {
    expect(toDisplay([0.25, 0.25, 0.25])).toEqual([127, 127, 127]);
    expect(toDisplay([1, 0, 0.0625])).toEqual([255, 0, 63]);
  });

  test("clamps out-of-range radiance", () => {
    expect(toDisplay([4, -1, 1.5])).toEqual([255, 0, 255]);
  });
});

describe("packColor", () => {
  test("keeps the existing top byte", () => {
    expect(packColor(0xff123456, [1, 2, 3])).toBe(0xff010203);
    expect(packColor(0x80ffffff, [0, 0, 0])).toBe(0x80000000);
    expect(packColor(0, [255, 255, 255])).toBe(0x00ffffff);
  });

  test("unpacks back to channels", () => {
    expect(unpackColor(0xff7f1e03)).toEqual([127, 30, 3]);
  });
});

describe("renderFrame", () => {
  test("2x2 empty world matches the background of each primary ray", () => {
    const camera = new Camera({ aspect: 1 });
    const bitmap = new Bitmap(2, 2);

    renderFrame(bitmap, { world: new World(), camera, samples: 1, maxDepth: 50, rng: Math.random, jitter: zero });

    for (let y = 0; y < 2; y++) {
      for (let x = 0; x < 2; x++) {
        const expected = packColor(0, toDisplay(background(camera.ray(x / 2, y / 2))));
        expect(bitmap.get(x, y)).toBe(expected);
      }
    }
    // The lower-left ray looks down and left, towards the white end of the sky.
    const [r, g] = unpackColor(bitmap.get(0, 0) ?? 0);
    expect([r, g]).toEqual([241, 246]);
  });

  test("linear 0.25 radiance lands on channel 127", () => {
    // A zero-fov camera looking up at the bottom of a grey sphere; the
    // centered diffuse draw sends the bounce straight down into white sky.
    const camera = new Camera({ eye: [0, -5, 0], at: [0, 0, 0], up: [0, 0, 1], fov: 0, aspect: 1 });
    const world = new World([new Sphere([0, 10, 0], 10, materials.diffuse([0.25, 0.25, 0.25]))]);
    const bitmap = new Bitmap(1, 1, Uint32Array.of(0xff000000));

    renderFrame(bitmap, { world, camera, samples: 1, maxDepth: 50, rng: () => 0.5, jitter: zero });

    expect(bitmap.buffer[0]).toBe(0xff7f7f7f);
  });

  test("writes every pixel and keeps each alpha byte", () => {
    const bitmap = new Bitmap(3, 2, new Uint32Array(6).fill(0xff000000));

    renderFrame(bitmap, {
      world: new World([new Sphere([0, 0, -1], 0.5, materials.diffuse([0.5, 0.5, 0.5]))]),
      camera: new Camera({ aspect: 1.5 }),
      samples: 2,
      maxDepth: 5,
      rng: Math.random,
    });

    for (const pixel of bitmap.buffer) {
      expect(pixel >>> 24).toBe(0xff);
      expect(pixel & 0x00ffffff).not.toBe(0);
    }
  });
});

describe("samplePixel", () => {
  test("averages over the sample count", () => {
    const camera = new Camera({ aspect: 1 });
    const opts = { world: new World(), camera, samples: 3, maxDepth: 50, rng: Math.random, jitter: zero };
    const sky = background(camera.ray(0, 0));
    const mean = samplePixel(0, 0, 4, 4, opts);

    expect(mean[0]).toBeCloseTo(sky[0], 12);
    expect(mean[1]).toBeCloseTo(sky[1], 12);
    expect(mean[2]).toBeCloseTo(sky[2], 12);
  });
});

describe("renderBand", () => {
  test("renders only the rows it owns", () => {
    const band = new Uint32Array(2);

    renderBand(band, { width: 2, height: 3, rowStart: 1, rowEnd: 2 }, {
      world: new World(),
      camera: new Camera({ aspect: 2 / 3 }),
      samples: 1,
      maxDepth: 50,
      rng: Math.random,
      jitter: zero,
    });

    const full = new Bitmap(2, 3);
    renderFrame(full, {
      world: new World(),
      camera: new Camera({ aspect: 2 / 3 }),
      samples: 1,
      maxDepth: 50,
      rng: Math.random,
      jitter: zero,
    });
    expect([...band]).toEqual([...full.readRows(1, 2)]);
  });
});
