import { createWriteStream } from "node:fs";
import fs from "node:fs/promises";
import path from "node:path";
import { pipeline } from "node:stream/promises";
import { request } from "undici";
import { modelWeightsFile, type ModelName } from "../../models";
import { log } from "../../util/log";
import { pathExists } from "../../util/tempDir";

export const MODEL_BASE_URL = "https://huggingface.co/ggerganov/whisper.cpp/resolve/main";
export const VAD_BASE_URL = "https://huggingface.co/ggml-org/whisper-vad/resolve/main";
export const VAD_WEIGHTS_FILE = "ggml-silero-v5.1.2.bin";

const MAX_REDIRECTS = 5;

export interface ModelStoreOptions {
  modelDir: string;
  autoDownload: boolean;
}

const headerValue = (value: string | string[] | undefined): string | undefined =>
  Array.isArray(value) ? value[0] : value;

export const downloadFile = async (url: string, destPath: string): Promise<void> => {
  let current = url;
  for (let hop = 0; hop <= MAX_REDIRECTS; hop += 1) {
    const res = await request(current, { method: "GET" });

    if (res.statusCode >= 300 && res.statusCode < 400) {
      const location = headerValue(res.headers.location);
      await res.body.dump();
      if (!location) throw new Error(`Download failed: HTTP ${res.statusCode} without location (${current})`);
      current = new URL(location, current).toString();
      continue;
    }

    if (res.statusCode < 200 || res.statusCode >= 300) {
      await res.body.dump();
      throw new Error(`Download failed: HTTP ${res.statusCode} (${current})`);
    }

    // a partial download never lands at destPath
    const partPath = `${destPath}.part`;
    try {
      await pipeline(res.body, createWriteStream(partPath));
      await fs.rename(partPath, destPath);
    } catch (err) {
      await fs.rm(partPath, { force: true });
      throw err;
    }
    return;
  }
  throw new Error(`Download failed: too many redirects (${url})`);
};

export const ensureFile = async (url: string, destPath: string, opts: ModelStoreOptions): Promise<string> => {
  if (await pathExists(destPath)) return destPath;

  if (!opts.autoDownload) {
    throw new Error(`Whisper weights not found at ${destPath} and WHISPER_AUTO_DOWNLOAD is disabled`);
  }

  await fs.mkdir(path.dirname(destPath), { recursive: true });
  const started = Date.now();
  log.info("downloading weights", { url, destPath });
  await downloadFile(url, destPath);
  log.info("weights downloaded", { destPath, ms: Date.now() - started });
  return destPath;
};

export const ensureModelWeights = async (model: ModelName, opts: ModelStoreOptions): Promise<string> => {
  const filename = modelWeightsFile(model);
  return await ensureFile(`${MODEL_BASE_URL}/${filename}`, path.join(opts.modelDir, filename), opts);
};

export const ensureVadWeights = async (opts: ModelStoreOptions): Promise<string> =>
  await ensureFile(`${VAD_BASE_URL}/${VAD_WEIGHTS_FILE}`, path.join(opts.modelDir, VAD_WEIGHTS_FILE), opts);
