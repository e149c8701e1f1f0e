import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import type { ModelName } from "../../models";
import type {
  DeviceConfig,
  InferenceHandle,
  InferenceOutput,
  InferenceParams,
  InferenceSegment,
  ModelLoader,
} from "../../types";
import { execFile, which } from "../../util/exec";
import { errorMessage, log } from "../../util/log";
import { pathExists, withTempDir } from "../../util/tempDir";
import { ensureModelWeights, ensureVadWeights } from "./modelStore";

const WHISPER_BIN_NAMES = ["whisper-cli", "whisper-cpp"];

interface WhisperCppLoaderOptions {
  whisperBin?: string;
  modelDir: string;
  autoDownload: boolean;
  timeoutMs: number;
  tmpDir: string;
}

interface WhisperCppHandleOptions {
  binPath: string;
  modelPath: string;
  vadModelPath: string;
  deviceConfig: DeviceConfig;
  timeoutMs: number;
  tmpDir: string;
}

// whisper-cli -oj output; only the fields we read.
const whisperJsonSchema = z.object({
  result: z.object({ language: z.string().optional() }).optional(),
  transcription: z
    .array(
      z.object({
        text: z.string(),
        offsets: z.object({ from: z.number(), to: z.number() }).optional(),
      }),
    )
    .default([]),
});

export interface WhisperJson {
  language: string | null;
  segments: InferenceSegment[];
}

export const parseWhisperJson = (raw: string): WhisperJson => {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new Error(`whisper.cpp wrote invalid JSON: ${errorMessage(err)}`);
  }
  const parsed = whisperJsonSchema.safeParse(json);
  if (!parsed.success) {
    throw new Error(`Unexpected whisper.cpp JSON output: ${parsed.error.issues[0]?.message ?? "invalid"}`);
  }
  return {
    language: parsed.data.result?.language || null,
    segments: parsed.data.transcription.map((s) => ({
      text: s.text,
      startMs: s.offsets?.from,
      endMs: s.offsets?.to,
    })),
  };
};

const DETECTED_LANGUAGE_RE = /auto-detected language:\s*([a-z]{2,3}(?:-[a-z]+)?)\s*\(p\s*=\s*([0-9]*\.?[0-9]+)\)/i;

/** Reads the `auto-detected language: en (p = 0.97)` line whisper.cpp logs on stderr. */
export const parseDetectedLanguage = (stderr: string): { language: string; probability: number } | null => {
  const match = DETECTED_LANGUAGE_RE.exec(stderr);
  if (!match) return null;
  const probability = Number(match[2]);
  if (!Number.isFinite(probability)) return null;
  return { language: match[1].toLowerCase(), probability: Math.min(1, Math.max(0, probability)) };
};

export const buildWhisperArgs = (
  opts: Pick<WhisperCppHandleOptions, "modelPath" | "vadModelPath" | "deviceConfig">,
  audioPath: string,
  outBase: string,
  params: InferenceParams,
): string[] => {
  const args = [
    "-m",
    opts.modelPath,
    "-f",
    audioPath,
    "-oj",
    "-of",
    outBase,
    "-bs",
    String(params.beamSize),
    "-l",
    params.language ?? "auto",
    "-t",
    String(opts.deviceConfig.threads),
  ];
  if (opts.deviceConfig.device === "cpu") {
    args.push("-ng");
  }
  if (params.voiceActivityFilter) {
    args.push("--vad", "-vm", opts.vadModelPath);
  }
  return args;
};

export class WhisperCppHandle implements InferenceHandle {
  constructor(private readonly opts: WhisperCppHandleOptions) {}

  async transcribe(audioPath: string, params: InferenceParams): Promise<InferenceOutput> {
    return await withTempDir(
      "stt-whisper-",
      async (dir) => {
        const outBase = path.join(dir, "out");
        const args = buildWhisperArgs(this.opts, audioPath, outBase, params);
        const res = await execFile(this.opts.binPath, args, { timeoutMs: this.opts.timeoutMs });

        if (res.code !== 0) {
          const stderrPreview = res.stderr.slice(-800);
          log.warn("whisper.cpp exited non-zero", {
            code: res.code,
            timedOut: res.timedOut,
            stderr: stderrPreview,
          });
          throw new Error(
            res.timedOut
              ? `whisper.cpp timed out after ${this.opts.timeoutMs}ms`
              : `whisper.cpp failed (code ${res.code}): ${stderrPreview.trim() || "(empty stderr)"}`,
          );
        }

        const parsed = parseWhisperJson(await fs.readFile(`${outBase}.json`, "utf8"));
        const detected = parseDetectedLanguage(res.stderr);

        return {
          segments: parsed.segments,
          info: {
            language: detected?.language ?? parsed.language,
            languageProbability: detected?.probability ?? null,
          },
        };
      },
      this.opts.tmpDir,
    );
  }
}

export const resolveWhisperBinary = async (configured?: string): Promise<string> => {
  if (configured) {
    if (await pathExists(configured)) return configured;
    const onPath = await which(configured);
    if (onPath) return onPath;
    throw new Error(`whisper.cpp binary not found at ${configured} (WHISPER_CPP_BIN)`);
  }
  for (const name of WHISPER_BIN_NAMES) {
    const found = await which(name);
    if (found) return found;
  }
  throw new Error(
    "whisper.cpp is not installed. Install it (e.g. brew install whisper-cpp) or set WHISPER_CPP_BIN",
  );
};

export class WhisperCppLoader implements ModelLoader {
  constructor(private readonly opts: WhisperCppLoaderOptions) {}

  async load(model: ModelName, deviceConfig: DeviceConfig): Promise<InferenceHandle> {
    const binPath = await resolveWhisperBinary(this.opts.whisperBin);
    const store = { modelDir: this.opts.modelDir, autoDownload: this.opts.autoDownload };
    const modelPath = await ensureModelWeights(model, store);
    const vadModelPath = await ensureVadWeights(store);

    log.info("whisper.cpp ready", { model, binPath, modelPath, device: deviceConfig.device, threads: deviceConfig.threads });

    return new WhisperCppHandle({
      binPath,
      modelPath,
      vadModelPath,
      deviceConfig,
      timeoutMs: this.opts.timeoutMs,
      tmpDir: this.opts.tmpDir,
    });
  }
}
