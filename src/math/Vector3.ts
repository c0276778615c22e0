/** Plain `{x, y, z}` record, as found in scene files and worker messages. */
export interface Vector3Like {
  x: number;
  y: number;
  z: number;
}

/**
 * Immutable 3-component vector used for points, directions and normals.
 * Every operation returns a new instance.
 */
export class Vector3 implements Vector3Like {
  readonly x: number;
  readonly y: number;
  readonly z: number;

  constructor(x: number, y: number, z: number) {
    this.x = x;
    this.y = y;
    this.z = z;
  }

  static readonly ZERO = new Vector3(0, 0, 0);

  static from(v: Vector3Like): Vector3 {
    return v instanceof Vector3 ? v : new Vector3(v.x, v.y, v.z);
  }

  add(o: Vector3): Vector3 {
    return new Vector3(this.x + o.x, this.y + o.y, this.z + o.z);
  }

  sub(o: Vector3): Vector3 {
    return new Vector3(this.x - o.x, this.y - o.y, this.z - o.z);
  }

  negate(): Vector3 {
    return new Vector3(-this.x, -this.y, -this.z);
  }

  /** Component-wise product. */
  mul(o: Vector3): Vector3 {
    return new Vector3(this.x * o.x, this.y * o.y, this.z * o.z);
  }

  scale(s: number): Vector3 {
    return new Vector3(this.x * s, this.y * s, this.z * s);
  }

  /** Component-wise quotient. */
  div(o: Vector3): Vector3 {
    return new Vector3(this.x / o.x, this.y / o.y, this.z / o.z);
  }

  divScalar(s: number): Vector3 {
    return new Vector3(this.x / s, this.y / s, this.z / s);
  }

  dot(o: Vector3): number {
    return this.x * o.x + this.y * o.y + this.z * o.z;
  }

  cross(o: Vector3): Vector3 {
    return new Vector3(
      this.y * o.z - this.z * o.y,
      this.z * o.x - this.x * o.z,
      this.x * o.y - this.y * o.x,
    );
  }

  lengthSquared(): number {
    return this.x * this.x + this.y * this.y + this.z * this.z;
  }

  length(): number {
    return Math.sqrt(this.lengthSquared());
  }

  /** Unit-length copy. A zero vector yields NaN components. */
  unit(): Vector3 {
    return this.divScalar(this.length());
  }

  /** True when every component is smaller in magnitude than machine epsilon. */
  nearZero(): boolean {
    return (
      Math.abs(this.x) < Number.EPSILON &&
      Math.abs(this.y) < Number.EPSILON &&
      Math.abs(this.z) < Number.EPSILON
    );
  }

  equals(o: Vector3Like): boolean {
    return this.x === o.x && this.y === o.y && this.z === o.z;
  }

  toJSON(): Vector3Like {
    return { x: this.x, y: this.y, z: this.z };
  }
}
