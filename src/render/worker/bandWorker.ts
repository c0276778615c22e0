/**
 * Worker thread entry point for band rendering.
 *
 * Receives the scene description once, rebuilds the scene locally, then
 * renders bands on request and returns their pixels (buffer transferred).
 */

import { parentPort } from "worker_threads";
import { createRandom } from "../../math/Random";
import { buildScene } from "../../scene/Scene";
import type { Scene } from "../../scene/Scene";
import { renderBand } from "../BandRenderer";
import type {
  MainToWorkerMessage,
  WorkerRenderBandMessage,
  WorkerToMainMessage,
} from "./BandWorkerProtocol";

export interface BandWorkerPort {
  postMessage(message: WorkerToMainMessage, transferList?: ArrayBuffer[]): void;
  close(): void;
}

export class BandWorker {
  private scene: Scene | null = null;
  private port: BandWorkerPort;

  constructor(port: BandWorkerPort) {
    this.port = port;
  }

  handleMessage(msg: MainToWorkerMessage): void {
    switch (msg.type) {
      case "init":
        this.scene = buildScene(msg.scene);
        this.port.postMessage({ type: "ready" });
        break;
      case "render-band":
        this.renderBand(msg);
        break;
      case "destroy":
        this.scene = null;
        this.port.close();
        break;
    }
  }

  private renderBand(msg: WorkerRenderBandMessage): void {
    if (!this.scene) {
      this.port.postMessage({
        type: "band-error",
        index: msg.band.index,
        error: "Scene not initialized",
      });
      return;
    }

    try {
      const result = renderBand(this.scene, msg.band, createRandom(msg.seed));
      const buffer = result.pixels.buffer;
      this.port.postMessage(
        { type: "band-result", ...result },
        buffer instanceof ArrayBuffer ? [buffer] : [],
      );
    } catch (e) {
      this.port.postMessage({
        type: "band-error",
        index: msg.band.index,
        error: e instanceof Error ? e.message : String(e),
      });
    }
  }
}

if (parentPort) {
  const port = parentPort;
  const worker = new BandWorker({
    postMessage: (message, transferList) => port.postMessage(message, transferList),
    close: () => port.close(),
  });
  port.on("message", (msg: MainToWorkerMessage) => worker.handleMessage(msg));
}
