import type { Vector3 } from "./Vector3";

export class Ray {
  readonly origin: Vector3;
  /** Not required to be unit length. */
  readonly direction: Vector3;

  constructor(origin: Vector3, direction: Vector3) {
    this.origin = origin;
    this.direction = direction;
  }

  /** Point along the ray at parameter t. */
  at(t: number): Vector3 {
    return this.origin.add(this.direction.scale(t));
  }
}
