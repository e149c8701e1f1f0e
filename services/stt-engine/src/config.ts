import os from "node:os";
import path from "node:path";
import type { Device, DeviceConfig } from "./types";

export interface EngineConfig {
  /** Explicit whisper-cli path; when unset the binary is looked up on PATH. */
  whisperBin?: string;
  modelDir: string;
  deviceConfig: DeviceConfig;
  timeoutMs: number;
  autoDownload: boolean;
  tmpDir: string;
}

const DEFAULT_MODEL_DIR = path.join(os.homedir(), ".cache", "local-stt", "models");

export const parseFlag = (raw: string | undefined, fallback: boolean): boolean => {
  if (!raw) return fallback;
  const normalized = raw.trim().toLowerCase();
  if (["0", "false", "no", "off"].includes(normalized)) return false;
  if (["1", "true", "yes", "on"].includes(normalized)) return true;
  return fallback;
};

/** Expands a leading `~` the way a shell would; dotenv leaves it alone. */
export const expandHome = (p: string): string => {
  if (p === "~") return os.homedir();
  if (p.startsWith("~/")) return path.join(os.homedir(), p.slice(2));
  return p;
};

const parseDevice = (raw: string | undefined): Device => {
  const normalized = raw?.trim().toLowerCase();
  return normalized === "cpu" ? "cpu" : "gpu";
};

const positiveInt = (raw: string | undefined, fallback: number): number => {
  const parsed = Number(raw ?? fallback);
  return Number.isInteger(parsed) && parsed > 0 ? parsed : fallback;
};

export const loadEngineConfig = (env: NodeJS.ProcessEnv = process.env): EngineConfig => ({
  whisperBin: env.WHISPER_CPP_BIN?.trim() || undefined,
  modelDir: expandHome(env.WHISPER_MODEL_DIR?.trim() || DEFAULT_MODEL_DIR),
  deviceConfig: {
    device: parseDevice(env.WHISPER_DEVICE),
    threads: positiveInt(env.WHISPER_THREADS, Math.min(os.cpus().length || 1, 4)),
  },
  timeoutMs: positiveInt(env.WHISPER_TIMEOUT_MS, 600_000),
  autoDownload: parseFlag(env.WHISPER_AUTO_DOWNLOAD, true),
  tmpDir: expandHome(env.STT_TMP_DIR?.trim() || os.tmpdir()),
});
