/** Scene JSON failed schema validation. `issues` holds one line per problem. */
export class SceneValidationError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid scene:\n  ${issues.join("\n  ")}`);
    this.name = "SceneValidationError";
    this.issues = issues;
  }
}

/** A texture could not be read or decoded. Fatal for the render. */
export class TextureLoadError extends Error {
  readonly path: string;

  constructor(path: string, reason: string, options?: { cause?: unknown }) {
    super(`Failed to load texture ${path}: ${reason}`, options);
    this.name = "TextureLoadError";
    this.path = path;
  }
}

/** A band failed to render; the whole render is aborted. */
export class RenderError extends Error {
  readonly bandIndex: number | null;

  constructor(message: string, bandIndex: number | null = null, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "RenderError";
    this.bandIndex = bandIndex;
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
