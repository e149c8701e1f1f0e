export { loadEngineConfig, type EngineConfig } from "./config";
export {
  DEFAULT_BEAM_SIZE,
  MAX_BEAM_SIZE,
  MIN_BEAM_SIZE,
  SttEngine,
  emptyResult,
  normalizeLanguage,
  type SttEngineOptions,
} from "./engine";
export { EngineCache, createEngineCache, type EngineFactory, type EngineStatus } from "./engineCache";
export {
  InvalidModelError,
  InvalidParameterError,
  PayloadTooLargeError,
  SttError,
  UnsupportedMediaError,
  type SttErrorCode,
} from "./errors";
export { DEFAULT_MODEL, MODEL_NAMES, isModelName, listModels, parseModelName, type ModelName } from "./models";
export type {
  Device,
  DeviceConfig,
  InferenceHandle,
  InferenceOutput,
  InferenceParams,
  ModelLoader,
  TranscriptionOptions,
  TranscriptionResult,
} from "./types";
export { errorMessage, log } from "./util/log";
export { pathExists, withTempDir } from "./util/tempDir";
