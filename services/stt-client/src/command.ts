import fs from "node:fs/promises";
import { DEFAULT_MODEL, pathExists, type SttEngine, type TranscriptionOptions } from "@local-stt/engine";
import { NO_AUDIO, renderResult } from "./render";
import type { transcribeRemote } from "./remote";

const VALUE_FLAGS = new Set(["--model", "--language", "--beam-size", "--remote", "--max-upload-mb", "--sample-rate"]);

export interface CliArgs {
  file?: string;
  model: string;
  options: TranscriptionOptions;
  /** API base URL; unset means the engine runs in-process. */
  remote?: string;
  maxUploadMB?: number;
  pcm: boolean;
  sampleRate?: number;
}

export interface CliDeps {
  engine: (model: string) => Pick<SttEngine, "transcribe" | "transcribePcm">;
  transcribeRemote: typeof transcribeRemote;
  write: (text: string) => void;
}

export const parseCliArgs = (argv: string[], env: NodeJS.ProcessEnv = process.env): CliArgs => {
  const arg = (name: string): string | undefined => {
    const idx = argv.indexOf(name);
    if (idx === -1) return undefined;
    return argv[idx + 1];
  };

  const flag = (name: string): boolean => argv.includes(name);

  const intArg = (name: string): number | undefined => {
    const raw = arg(name);
    if (raw === undefined) return undefined;
    const value = Number(raw);
    if (!Number.isInteger(value)) throw new Error(`${name} expects an integer, got "${raw}"`);
    return value;
  };

  let file: string | undefined;
  for (let i = 0; i < argv.length; i += 1) {
    const current = argv[i];
    if (VALUE_FLAGS.has(current)) {
      i += 1;
      continue;
    }
    if (!current.startsWith("--")) {
      file = current;
      break;
    }
  }

  return {
    file,
    model: arg("--model") ?? DEFAULT_MODEL,
    options: {
      language: arg("--language") ?? null,
      beamSize: intArg("--beam-size"),
      voiceActivityFilter: !flag("--no-vad"),
    },
    remote: flag("--local") ? undefined : (arg("--remote") ?? env.STT_API_URL) || undefined,
    maxUploadMB: intArg("--max-upload-mb"),
    pcm: flag("--pcm"),
    sampleRate: intArg("--sample-rate"),
  };
};

/** Runs one transcription and returns the process exit code. */
export const runCli = async (args: CliArgs, deps: CliDeps): Promise<number> => {
  const { file } = args;
  if (!file || !(await pathExists(file))) {
    deps.write(`${NO_AUDIO}\n`);
    return 1;
  }

  if (args.remote) {
    const result = await deps.transcribeRemote(args.remote, file, {
      model: args.model,
      language: args.options.language ?? undefined,
      beamSize: args.options.beamSize,
      voiceActivityFilter: args.options.voiceActivityFilter,
      maxUploadMB: args.maxUploadMB,
    });
    deps.write(`${renderResult(result)}\n`);
    return 0;
  }

  const engine = deps.engine(args.model);
  const result = args.pcm
    ? await engine.transcribePcm(await fs.readFile(file), args.sampleRate, args.options)
    : await engine.transcribe(file, args.options);

  if (!result.text && result.elapsedSeconds === 0) {
    deps.write(`${NO_AUDIO}\n`);
    return 1;
  }
  deps.write(`${renderResult({ ...result, seconds: result.elapsedSeconds })}\n`);
  return 0;
};
