export * from "./types";
export * from "./errors";
export * from "./color/Color";
export { Vector3 } from "./math/Vector3";
export type { Vector3Like } from "./math/Vector3";
export { Ray } from "./math/Ray";
export { createRandom, deriveSeed, randomSeed } from "./math/Random";
export type { Random } from "./math/Random";
export { Camera } from "./camera/Camera";
export type { CameraParams } from "./camera/Camera";
export { hitSphere, sphereUV } from "./geometry/Sphere";
export type { HitRecord, Sphere } from "./geometry/Sphere";
export { findLights, hitWorld } from "./geometry/World";
export * from "./materials/Materials";
export { scatter, reflect, refract, reflectance } from "./materials/Scatter";
export type { ScatterResult } from "./materials/Scatter";
export { rayColor } from "./integrator/RayColor";
export { sampleSky } from "./integrator/Sky";
export { buildScene } from "./scene/Scene";
export type { Scene } from "./scene/Scene";
export { loadScene, loadSceneFile } from "./scene/SceneLoader";
export { parseSceneJson, sceneSchema } from "./scene/SceneSchema";
export type { SceneJson } from "./scene/SceneSchema";
export { serializeScene, sceneToJsonString } from "./scene/Serializer";
export { coverScene, testScene, presetScene } from "./scene/Presets";
export { partitionBands, assembleBands } from "./render/BandTypes";
export { renderBand } from "./render/BandRenderer";
export { Renderer, renderToFile } from "./render/Renderer";
export type { RenderResult } from "./render/Renderer";
export { DEFAULT_RENDER_SETTINGS, resolveRenderSettings } from "./settings/RenderSettings";
export type { RenderSettings } from "./settings/RenderSettings";
export { encodePng } from "./image/PngEncoder";
export { decodePng } from "./image/PngDecoder";
export { decodeImage, decodeJpeg } from "./image/ImageDecoder";
export { writePng } from "./image/ImageWriter";
export { generateNoiseTexture } from "./texture/NoiseTexture";
