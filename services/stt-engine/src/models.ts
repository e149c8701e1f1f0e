import { InvalidModelError } from "./errors";

/** Ordered smallest (fastest) to largest (most accurate). */
export const MODEL_NAMES = ["tiny", "base", "small", "medium", "large"] as const;

export type ModelName = (typeof MODEL_NAMES)[number];

export const DEFAULT_MODEL: ModelName = "small";

const ALIASES: Record<string, ModelName> = {
  "large-v3": "large",
};

const WEIGHTS_FILES: Record<ModelName, string> = {
  tiny: "ggml-tiny.bin",
  base: "ggml-base.bin",
  small: "ggml-small.bin",
  medium: "ggml-medium.bin",
  large: "ggml-large-v3.bin",
};

export const listModels = (): readonly ModelName[] => MODEL_NAMES;

export const isModelName = (raw: string): raw is ModelName =>
  (MODEL_NAMES as readonly string[]).includes(raw);

export const parseModelName = (raw: string): ModelName => {
  const normalized = raw.trim().toLowerCase();
  if (isModelName(normalized)) return normalized;
  const alias = ALIASES[normalized];
  if (alias) return alias;
  throw new InvalidModelError(raw, MODEL_NAMES);
};

export const modelWeightsFile = (model: ModelName): string => WEIGHTS_FILES[model];
