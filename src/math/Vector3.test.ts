import { Ray } from "./Ray";
import { Vector3 } from "./Vector3";

describe("Vector3", () => {
  const a = new Vector3(1, 2, 3);
  const b = new Vector3(4, -5, 6);

  it("adds, subtracts and negates", () => {
    expect(a.add(b).equals({ x: 5, y: -3, z: 9 })).toBe(true);
    expect(a.sub(b).equals({ x: -3, y: 7, z: -3 })).toBe(true);
    expect(a.negate().equals({ x: -1, y: -2, z: -3 })).toBe(true);
  });

  it("multiplies and divides component-wise and by scalars", () => {
    expect(a.mul(b).equals({ x: 4, y: -10, z: 18 })).toBe(true);
    expect(a.scale(2).equals({ x: 2, y: 4, z: 6 })).toBe(true);
    expect(b.div(new Vector3(2, 5, 3)).equals({ x: 2, y: -1, z: 2 })).toBe(true);
    expect(b.divScalar(2).equals({ x: 2, y: -2.5, z: 3 })).toBe(true);
  });

  it("computes dot and cross products", () => {
    expect(a.dot(b)).toBe(12);
    expect(new Vector3(1, 0, 0).cross(new Vector3(0, 1, 0)).equals({ x: 0, y: 0, z: 1 })).toBe(true);
    expect(a.cross(b).equals({ x: 27, y: 6, z: -13 })).toBe(true);
  });

  it("computes lengths and unit vectors", () => {
    const v = new Vector3(3, 4, 0);
    expect(v.lengthSquared()).toBe(25);
    expect(v.length()).toBe(5);
    expect(v.unit().equals({ x: 0.6, y: 0.8, z: 0 })).toBe(true);
  });

  it("yields NaN when normalizing a zero vector", () => {
    const u = Vector3.ZERO.unit();
    expect(Number.isNaN(u.x)).toBe(true);
  });

  it("detects near-zero vectors", () => {
    expect(new Vector3(1e-20, -1e-20, 0).nearZero()).toBe(true);
    expect(new Vector3(1e-20, 1e-3, 0).nearZero()).toBe(false);
  });

  it("converts plain records and reuses existing instances", () => {
    const v = Vector3.from({ x: 1, y: 2, z: 3 });
    expect(v).toBeInstanceOf(Vector3);
    expect(v.equals(a)).toBe(true);
    expect(Vector3.from(a)).toBe(a);
  });

  it("serializes to a plain record", () => {
    expect(JSON.parse(JSON.stringify(a))).toEqual({ x: 1, y: 2, z: 3 });
  });
});

describe("Ray", () => {
  it("evaluates points along the ray", () => {
    const ray = new Ray(new Vector3(1, 1, 1), new Vector3(0, 0, -2));
    expect(ray.at(0).equals({ x: 1, y: 1, z: 1 })).toBe(true);
    expect(ray.at(1.5).equals({ x: 1, y: 1, z: -2 })).toBe(true);
  });
});
