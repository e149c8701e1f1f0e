import type { EngineConfig } from "./config";
import { SttEngine } from "./engine";
import { parseModelName, type ModelName } from "./models";
import { WhisperCppLoader } from "./modules/asr/whisperCpp";
import { log } from "./util/log";

export type EngineFactory = (model: ModelName) => SttEngine;

export interface EngineStatus {
  model: ModelName;
  ready: boolean;
}

/**
 * Process-wide model → engine map. Engines are created on first request and
 * never evicted; creating one does not load the model.
 */
export class EngineCache {
  private readonly engines = new Map<ModelName, SttEngine>();

  constructor(private readonly factory: EngineFactory) {}

  get(model: ModelName | string): SttEngine {
    const name = parseModelName(model);
    const existing = this.engines.get(name);
    if (existing) return existing;

    const engine = this.factory(name);
    this.engines.set(name, engine);
    log.debug("engine created", { model: name });
    return engine;
  }

  entries(): EngineStatus[] {
    return [...this.engines.values()].map((engine) => ({ model: engine.model, ready: engine.isReady }));
  }
}

export const createEngineCache = (config: EngineConfig): EngineCache => {
  const loader = new WhisperCppLoader({
    whisperBin: config.whisperBin,
    modelDir: config.modelDir,
    autoDownload: config.autoDownload,
    timeoutMs: config.timeoutMs,
    tmpDir: config.tmpDir,
  });
  return new EngineCache(
    (model) => new SttEngine({ model, loader, deviceConfig: config.deviceConfig, tmpDir: config.tmpDir }),
  );
};
