import { Ray } from "../math/Ray";
import { Vector3 } from "../math/Vector3";
import type { Vector3Like } from "../math/Vector3";

export interface CameraParams {
  lookFrom: Vector3Like;
  lookAt: Vector3Like;
  /** World "up" hint. Must not be parallel to the view direction. */
  vup: Vector3Like;
  /** Vertical field of view in degrees. */
  vfov: number;
  aspect: number;
}

/**
 * Pinhole camera. The view frame is derived once at construction;
 * `getRay` maps normalized image coordinates to primary rays.
 *
 * (s, t) = (0, 0) is the lower-left corner of the image plane,
 * (1, 1) the upper-right.
 */
export class Camera {
  readonly origin: Vector3;
  readonly lowerLeftCorner: Vector3;
  readonly horizontal: Vector3;
  readonly vertical: Vector3;

  /** Orthonormal view basis: u right, v up, w backwards (away from lookAt). */
  readonly u: Vector3;
  readonly v: Vector3;
  readonly w: Vector3;

  readonly params: Readonly<CameraParams>;

  constructor(params: CameraParams) {
    this.params = params;

    const lookFrom = Vector3.from(params.lookFrom);
    const lookAt = Vector3.from(params.lookAt);
    const vup = Vector3.from(params.vup);

    const theta = (params.vfov * Math.PI) / 180;
    const halfHeight = Math.tan(theta / 2);
    const halfWidth = params.aspect * halfHeight;

    this.w = lookFrom.sub(lookAt).unit();
    this.u = vup.cross(this.w).unit();
    this.v = this.w.cross(this.u);

    this.origin = lookFrom;
    this.lowerLeftCorner = this.origin
      .sub(this.u.scale(halfWidth))
      .sub(this.v.scale(halfHeight))
      .sub(this.w);
    this.horizontal = this.u.scale(2 * halfWidth);
    this.vertical = this.v.scale(2 * halfHeight);
  }

  getRay(s: number, t: number): Ray {
    return new Ray(
      this.origin,
      this.lowerLeftCorner
        .add(this.horizontal.scale(s))
        .add(this.vertical.scale(t))
        .sub(this.origin),
    );
  }
}
