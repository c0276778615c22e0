import { diffuse, emissive, metal } from "../materials/Materials";
import { Ray } from "../math/Ray";
import { Vector3 } from "../math/Vector3";
import { expectVectorClose } from "../testing/expectVector";
import { createSphere, hitSphere, sphereUV } from "./Sphere";
import { findLights, hitWorld } from "./World";

const gray = diffuse([0.5, 0.5, 0.5]);

function sphereAt(z: number, radius: number) {
  return createSphere({ center: { x: 0, y: 0, z }, radius, material: gray });
}

describe("hitSphere", () => {
  it("returns the near root for a ray from outside", () => {
    const sphere = sphereAt(-5, 1);
    const ray = new Ray(Vector3.ZERO, new Vector3(0, 0, -1));
    const hit = hitSphere(sphere, ray, 0.001, Infinity);

    expect(hit).not.toBeNull();
    expect(hit?.t).toBe(4);
    expect(hit?.frontFace).toBe(true);
    expectVectorClose(hit?.point ?? Vector3.ZERO, { x: 0, y: 0, z: -4 });
    expectVectorClose(hit?.normal ?? Vector3.ZERO, { x: 0, y: 0, z: 1 });
  });

  it("misses when the discriminant is negative", () => {
    const sphere = sphereAt(-5, 1);
    const ray = new Ray(new Vector3(0, 3, 0), new Vector3(0, 0, -1));
    expect(hitSphere(sphere, ray, 0.001, Infinity)).toBeNull();
  });

  it("falls back to the far root when the near one is outside the interval", () => {
    const sphere = sphereAt(0, 1);
    const ray = new Ray(Vector3.ZERO, new Vector3(0, 0, -1));
    const hit = hitSphere(sphere, ray, 0.001, Infinity);

    expect(hit?.t).toBe(1);
    expect(hit?.frontFace).toBe(false);
    // Flipped to face the ray
    expectVectorClose(hit?.normal ?? Vector3.ZERO, { x: 0, y: 0, z: 1 });
  });

  it("treats the interval as open", () => {
    const sphere = sphereAt(-5, 1);
    const ray = new Ray(Vector3.ZERO, new Vector3(0, 0, -1));
    expect(hitSphere(sphere, ray, 0.001, 4)).toBeNull();
    expect(hitSphere(sphere, ray, 6, Infinity)).toBeNull();
  });

  it("flips normals of a negative-radius sphere inward", () => {
    const shell = sphereAt(-5, -1);
    const ray = new Ray(Vector3.ZERO, new Vector3(0, 0, -1));
    const hit = hitSphere(shell, ray, 0.001, Infinity);

    expect(hit?.t).toBe(4);
    // Geometric normal points into the sphere, so the ray sees a back face
    expect(hit?.frontFace).toBe(false);
    expectVectorClose(hit?.normal ?? Vector3.ZERO, { x: 0, y: 0, z: 1 });
  });

  it("records the object index", () => {
    const sphere = sphereAt(-5, 1);
    const ray = new Ray(Vector3.ZERO, new Vector3(0, 0, -1));
    expect(hitSphere(sphere, ray, 0.001, Infinity, 3)?.objectIndex).toBe(3);
  });

  it("always returns a normal opposing the ray", () => {
    const sphere = sphereAt(-3, 1.5);
    for (const dir of [new Vector3(0.1, 0.2, -1), new Vector3(-0.3, 0, -1), new Vector3(0, -0.4, -1)]) {
      const ray = new Ray(Vector3.ZERO, dir);
      const hit = hitSphere(sphere, ray, 0.001, Infinity);
      expect(hit).not.toBeNull();
      expect(dir.dot(hit?.normal ?? Vector3.ZERO)).toBeLessThan(0);
    }
  });
});

describe("sphereUV", () => {
  it("maps the poles and the +z direction", () => {
    expect(sphereUV(new Vector3(0, 1, 0)).v).toBe(1);
    expect(sphereUV(new Vector3(0, -1, 0)).v).toBe(0);
    expect(sphereUV(new Vector3(0, 0, 1))).toEqual({ u: 0.5, v: 0.5 });
  });

  it("wraps u around the y axis", () => {
    expect(sphereUV(new Vector3(1, 0, 0)).u).toBeCloseTo(0.75, 10);
    expect(sphereUV(new Vector3(-1, 0, 0)).u).toBeCloseTo(0.25, 10);
  });

  it("normalizes its input", () => {
    expect(sphereUV(new Vector3(0, 4, 0)).v).toBe(1);
  });
});

describe("hitWorld", () => {
  it("returns the closest hit regardless of list order", () => {
    const far = sphereAt(-10, 1);
    const near = sphereAt(-5, 1);
    const ray = new Ray(Vector3.ZERO, new Vector3(0, 0, -1));

    const hit = hitWorld([far, near], ray, 0.001, Number.MAX_VALUE);
    expect(hit?.t).toBe(4);
    expect(hit?.objectIndex).toBe(1);
  });

  it("returns null for an empty world", () => {
    const ray = new Ray(Vector3.ZERO, new Vector3(0, 0, -1));
    expect(hitWorld([], ray, 0.001, Number.MAX_VALUE)).toBeNull();
  });
});

describe("findLights", () => {
  it("returns only emissive spheres, in order", () => {
    const light1 = createSphere({ center: { x: 0, y: 5, z: 0 }, radius: 1, material: emissive() });
    const mirror = createSphere({ center: { x: 1, y: 0, z: 0 }, radius: 1, material: metal([1, 1, 1], 0) });
    const light2 = createSphere({ center: { x: 0, y: -5, z: 0 }, radius: 2, material: emissive() });

    expect(findLights([light1, mirror, sphereAt(0, 1), light2])).toEqual([light1, light2]);
    expect(findLights([mirror])).toEqual([]);
  });
});
