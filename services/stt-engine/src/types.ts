import type { ModelName } from "./models";

export type Device = "cpu" | "gpu";

export interface DeviceConfig {
  device: Device;
  threads: number;
}

export interface TranscriptionOptions {
  /** Language code, or "auto" / blank / null to let the model detect it. */
  language?: string | null;
  beamSize?: number;
  voiceActivityFilter?: boolean;
}

export interface TranscriptionResult {
  readonly text: string;
  readonly detectedLanguage: string | null;
  readonly languageProbability: number | null;
  readonly elapsedSeconds: number;
}

/** Parameters after normalization, as handed to the inference backend. */
export interface InferenceParams {
  language: string | null;
  beamSize: number;
  voiceActivityFilter: boolean;
}

export interface InferenceSegment {
  text: string;
  startMs?: number;
  endMs?: number;
}

export interface InferenceInfo {
  language: string | null;
  languageProbability: number | null;
}

export interface InferenceOutput {
  segments: Iterable<InferenceSegment>;
  info: InferenceInfo;
}

/** A loaded model, shared read-only by every caller of one engine. */
export interface InferenceHandle {
  transcribe(audioPath: string, params: InferenceParams): Promise<InferenceOutput>;
}

export interface ModelLoader {
  load(model: ModelName, device: DeviceConfig): Promise<InferenceHandle>;
}
