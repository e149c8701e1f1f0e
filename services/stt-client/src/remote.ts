import fs from "node:fs/promises";
import path from "node:path";
import type { ResultView } from "./render";

export interface RemoteOptions {
  model?: string;
  language?: string;
  beamSize?: number;
  voiceActivityFilter?: boolean;
  maxUploadMB?: number;
  timeoutMs?: number;
}

export interface RemoteResult extends ResultView {
  model: string;
  bytes: number;
}

export class RemoteApiError extends Error {
  constructor(
    readonly status: number,
    readonly body: string,
  ) {
    super(`API error ${status}: ${body.slice(0, 500)}`);
    this.name = "RemoteApiError";
  }
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const numberOrNull = (value: unknown): number | null => (typeof value === "number" ? value : null);

export const parseRemoteResult = (body: unknown): RemoteResult => {
  if (!isRecord(body) || typeof body.text !== "string") {
    throw new Error("Unexpected API response: missing text");
  }
  return {
    text: body.text,
    model: typeof body.model === "string" ? body.model : "?",
    detectedLanguage: typeof body.detectedLanguage === "string" ? body.detectedLanguage : null,
    languageProbability: numberOrNull(body.languageProbability),
    seconds: numberOrNull(body.seconds) ?? 0,
    bytes: numberOrNull(body.bytes) ?? 0,
  };
};

export const buildTranscribeUrl = (baseUrl: string, opts: RemoteOptions): string => {
  const url = new URL("/v1/transcribe", baseUrl);
  if (opts.model) url.searchParams.set("model", opts.model);
  if (opts.beamSize !== undefined) url.searchParams.set("beamSize", String(opts.beamSize));
  if (opts.voiceActivityFilter !== undefined) {
    url.searchParams.set("voiceActivityFilter", opts.voiceActivityFilter ? "true" : "false");
  }
  if (opts.maxUploadMB !== undefined) url.searchParams.set("maxUploadMB", String(opts.maxUploadMB));
  const language = opts.language?.trim();
  if (language) url.searchParams.set("language", language);
  return url.toString();
};

/** Uploads an audio file to a running stt api and returns its result. */
export const transcribeRemote = async (
  baseUrl: string,
  audioPath: string,
  opts: RemoteOptions = {},
): Promise<RemoteResult> => {
  const data = await fs.readFile(audioPath);
  const form = new FormData();
  form.append("file", new Blob([data], { type: "application/octet-stream" }), path.basename(audioPath));

  const response = await fetch(buildTranscribeUrl(baseUrl, opts), {
    method: "POST",
    body: form,
    signal: AbortSignal.timeout(opts.timeoutMs ?? 300_000),
  });

  if (!response.ok) {
    throw new RemoteApiError(response.status, await response.text());
  }
  return parseRemoteResult(await response.json());
};
