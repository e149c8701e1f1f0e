import "dotenv/config";
import { createServer } from "node:http";
import { createEngineCache, errorMessage, loadEngineConfig, log, parseModelName } from "@local-stt/engine";
import { createApp } from "./app";

const PORT = Number(process.env.PORT ?? 8000);
const HOST = process.env.HOST ?? "0.0.0.0";
// comma-separated models to load at startup instead of on first request
const PRELOAD_MODELS = (process.env.STT_PRELOAD_MODELS ?? "")
  .split(",")
  .map((m) => m.trim())
  .filter(Boolean);

const config = loadEngineConfig();
const engines = createEngineCache(config);
const app = createApp({ engines, tmpDir: config.tmpDir });

for (const raw of PRELOAD_MODELS) {
  const model = parseModelName(raw);
  engines
    .get(model)
    .ensureReady()
    .catch((err: unknown) => {
      log.error("model preload failed", { model, err: errorMessage(err) });
    });
}

const server = createServer(app);
server.listen(PORT, HOST, () => {
  log.info("stt api listening", {
    port: PORT,
    host: HOST,
    device: config.deviceConfig.device,
    modelDir: config.modelDir,
    preload: PRELOAD_MODELS,
  });
});
