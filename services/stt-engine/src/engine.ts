import path from "node:path";
import { performance } from "node:perf_hooks";
import { InvalidParameterError } from "./errors";
import type { ModelName } from "./models";
import type {
  DeviceConfig,
  InferenceHandle,
  InferenceOutput,
  InferenceParams,
  ModelLoader,
  TranscriptionOptions,
  TranscriptionResult,
} from "./types";
import { PCM16_SAMPLE_RATE, writeWavPcm16Mono } from "./util/audio";
import { errorMessage, log } from "./util/log";
import { pathExists, withTempDir } from "./util/tempDir";

export const MIN_BEAM_SIZE = 1;
export const MAX_BEAM_SIZE = 10;
export const DEFAULT_BEAM_SIZE = 5;

export interface SttEngineOptions {
  model: ModelName;
  loader: ModelLoader;
  deviceConfig: DeviceConfig;
  /** Parent directory for the WAV files written by `transcribePcm`. */
  tmpDir?: string;
}

/**
 * The result for absent input. Empty text plus zero elapsed time is the only
 * thing separating it from a transcription that found no speech.
 */
export const emptyResult = (): TranscriptionResult =>
  Object.freeze({ text: "", detectedLanguage: null, languageProbability: null, elapsedSeconds: 0 });

export const normalizeLanguage = (language: string | null | undefined): string | null => {
  const trimmed = language?.trim();
  if (!trimmed || trimmed.toLowerCase() === "auto") return null;
  return trimmed;
};

export const validateBeamSize = (beamSize: number): number => {
  if (!Number.isInteger(beamSize) || beamSize < MIN_BEAM_SIZE || beamSize > MAX_BEAM_SIZE) {
    throw new InvalidParameterError(
      "beamSize",
      `beamSize must be an integer between ${MIN_BEAM_SIZE} and ${MAX_BEAM_SIZE} (got ${beamSize})`,
    );
  }
  return beamSize;
};

export const joinSegments = (output: InferenceOutput): string => {
  let text = "";
  for (const segment of output.segments) {
    text += segment.text;
  }
  return text.trim();
};

/**
 * One model, loaded on first use. Concurrent first callers share a single
 * load; a failed load leaves the engine uninitialized so the next call retries.
 */
export class SttEngine {
  readonly model: ModelName;

  private handle: InferenceHandle | null = null;
  private loading: Promise<InferenceHandle> | null = null;

  constructor(private readonly opts: SttEngineOptions) {
    this.model = opts.model;
  }

  get isReady(): boolean {
    return this.handle !== null;
  }

  async ensureReady(): Promise<InferenceHandle> {
    if (this.handle) return this.handle;
    if (!this.loading) {
      this.loading = this.initialize().finally(() => {
        this.loading = null;
      });
    }
    return await this.loading;
  }

  private async initialize(): Promise<InferenceHandle> {
    const started = performance.now();
    log.info("engine init start", { model: this.model, device: this.opts.deviceConfig.device });
    try {
      const handle = await this.opts.loader.load(this.model, this.opts.deviceConfig);
      this.handle = handle;
      log.info("engine init done", { model: this.model, ms: Math.round(performance.now() - started) });
      return handle;
    } catch (err) {
      log.error("engine init failed", { model: this.model, err: errorMessage(err) });
      throw err;
    }
  }

  async transcribe(audioPath: string, options: TranscriptionOptions = {}): Promise<TranscriptionResult> {
    if (!audioPath || !(await pathExists(audioPath))) {
      return emptyResult();
    }

    const params: InferenceParams = {
      language: normalizeLanguage(options.language),
      beamSize: validateBeamSize(options.beamSize ?? DEFAULT_BEAM_SIZE),
      voiceActivityFilter: options.voiceActivityFilter ?? true,
    };

    const handle = await this.ensureReady();

    const started = performance.now();
    const output = await handle.transcribe(audioPath, params);
    const text = joinSegments(output);
    const elapsedSeconds = (performance.now() - started) / 1000;

    log.info("transcribed", {
      model: this.model,
      file: path.basename(audioPath),
      beamSize: params.beamSize,
      language: params.language ?? "auto",
      detectedLanguage: output.info.language,
      elapsedMs: Math.round(elapsedSeconds * 1000),
      textPreview: text.slice(0, 80),
    });

    return Object.freeze({
      text,
      detectedLanguage: output.info.language,
      languageProbability: output.info.languageProbability,
      elapsedSeconds,
    });
  }

  async transcribePcm(
    pcm16: Buffer,
    sampleRate: number = PCM16_SAMPLE_RATE,
    options: TranscriptionOptions = {},
  ): Promise<TranscriptionResult> {
    if (pcm16.length === 0) {
      return emptyResult();
    }
    if (!Number.isInteger(sampleRate) || sampleRate <= 0) {
      throw new InvalidParameterError("sampleRate", `sampleRate must be a positive integer (got ${sampleRate})`);
    }
    if (pcm16.length % 2 !== 0) {
      throw new InvalidParameterError("pcm", `16-bit PCM must have an even byte length (got ${pcm16.length})`);
    }

    return await withTempDir(
      "stt-pcm-",
      async (dir) => {
        const wavPath = path.join(dir, "input.wav");
        await writeWavPcm16Mono(wavPath, pcm16, sampleRate);
        return await this.transcribe(wavPath, options);
      },
      this.opts.tmpDir,
    );
  }
}
