import { BLACK, SKY_BLUE, WHITE, clamp01, lerpColor, scaleColor } from "../color/Color";
import type { Color } from "../color/Color";
import type { Vector3 } from "../math/Vector3";
import { sampleEnvironment } from "../texture/TextureSampler";
import type { Sky } from "../types";

/** Environment maps are dimmed so they don't overpower scene lighting. */
export const ENVIRONMENT_DIMMING = 0.7;

/**
 * Background radiance for a ray that escapes the scene.
 *
 * - no sky:   black
 * - gradient: white at the horizon blending to sky blue overhead
 * - texture:  equirectangular lookup by longitude/latitude, dimmed
 */
export function sampleSky(sky: Sky | null, direction: Vector3): Color {
  if (!sky) return BLACK;

  const unit = direction.unit();
  const t = clamp01(0.5 * (unit.y + 1));

  switch (sky.kind) {
    case "gradient":
      return lerpColor(WHITE, SKY_BLUE, t);
    case "texture": {
      const u = clamp01(Math.atan2(unit.x, unit.z) / (2 * Math.PI) + 0.5);
      return scaleColor(sampleEnvironment(sky.texture, u, t), ENVIRONMENT_DIMMING);
    }
  }
}
