/**
 * Shared type definitions for main↔worker communication.
 * No runtime code, just interfaces and discriminated union types.
 */

import type { SceneDescription } from "../../types";
import type { Band } from "../BandTypes";

// ─── Main → Worker Messages ──────────────────────────────────

export interface WorkerInitMessage {
  type: "init";
  /** Cloned once per worker; texture buffers included. */
  scene: SceneDescription;
}

export interface WorkerRenderBandMessage {
  type: "render-band";
  band: Band;
  /** Seed of the band's private random stream. */
  seed: number;
}

export interface WorkerDestroyMessage {
  type: "destroy";
}

export type MainToWorkerMessage =
  | WorkerInitMessage
  | WorkerRenderBandMessage
  | WorkerDestroyMessage;

// ─── Worker → Main Messages ──────────────────────────────────

export interface WorkerBandResultMessage {
  type: "band-result";
  index: number;
  startRow: number;
  rowCount: number;
  /** Transferred, not cloned. */
  pixels: Uint8Array;
}

export interface WorkerBandErrorMessage {
  type: "band-error";
  index: number;
  error: string;
}

export interface WorkerReadyMessage {
  type: "ready";
}

export type WorkerToMainMessage =
  | WorkerBandResultMessage
  | WorkerBandErrorMessage
  | WorkerReadyMessage;
