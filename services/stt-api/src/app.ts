import express from "express";
import type { ErrorRequestHandler, NextFunction, Request, RequestHandler, Response } from "express";
import {
  DEFAULT_MODEL,
  SttError,
  errorMessage,
  listModels,
  log,
  parseModelName,
  withTempDir,
  type EngineStatus,
  type ModelName,
  type SttEngine,
} from "@local-stt/engine";
import { parseTranscribeQuery } from "./params";
import { receiveUpload } from "./upload";
import { createTrace, mark, msSinceStart } from "./util/trace";

export type TranscribingEngine = Pick<SttEngine, "transcribe">;

/** The slice of the engine cache the API needs. */
export interface EngineRegistry {
  get(model: ModelName): TranscribingEngine;
  entries(): EngineStatus[];
}

export interface AppDeps {
  engines: EngineRegistry;
  /** Parent directory for uploads while they are transcribed. */
  tmpDir?: string;
}

export interface TranscribeResponse {
  text: string;
  model: ModelName;
  detectedLanguage: string | null;
  languageProbability: number | null;
  seconds: number;
  bytes: number;
}

const asyncRoute =
  (fn: (req: Request, res: Response) => Promise<void>): RequestHandler =>
  (req: Request, res: Response, next: NextFunction) => {
    fn(req, res).catch(next);
  };

const errorHandler: ErrorRequestHandler = (err: unknown, req, res, _next) => {
  if (err instanceof SttError) {
    log.warn("request rejected", { path: req.path, code: err.code, status: err.status, detail: err.message });
    res.status(err.status).json({ error: err.code, detail: err.message });
    return;
  }
  log.error("request failed", { path: req.path, err: errorMessage(err) });
  res.status(500).json({ error: "transcription_failed", detail: errorMessage(err) });
};

export const createApp = (deps: AppDeps) => {
  const app = express();
  app.disable("x-powered-by");

  app.get("/health", (_req, res) => {
    res.json({ ok: true });
  });

  app.get("/v1/models", (_req, res) => {
    res.json({ models: listModels(), default: DEFAULT_MODEL, loaded: deps.engines.entries() });
  });

  app.post(
    "/v1/transcribe",
    asyncRoute(async (req, res) => {
      const trace = createTrace(req.header("x-request-id"));
      const query = parseTranscribeQuery(req.query);
      const model = parseModelName(query.model);

      const body = await withTempDir(
        "stt-upload-",
        async (dir): Promise<TranscribeResponse> => {
          const upload = await receiveUpload(req, dir, { maxUploadMB: query.maxUploadMB });
          mark(trace, "upload_done");

          const result = await deps.engines.get(model).transcribe(upload.path, {
            language: query.language ?? null,
            beamSize: query.beamSize,
            voiceActivityFilter: query.voiceActivityFilter,
          });
          mark(trace, "transcribe_done");

          return {
            text: result.text,
            model,
            detectedLanguage: result.detectedLanguage,
            languageProbability: result.languageProbability,
            seconds: Math.round(result.elapsedSeconds * 1000) / 1000,
            bytes: upload.bytes,
          };
        },
        deps.tmpDir,
      );

      log.info("transcribe request", {
        traceId: trace.traceId,
        model,
        bytes: body.bytes,
        seconds: body.seconds,
        ms: msSinceStart(trace),
        marks: trace.marks,
      });
      res.setHeader("x-request-id", trace.traceId);
      res.json(body);
    }),
  );

  app.use(errorHandler);
  return app;
};
