import { createWriteStream } from "node:fs";
import path from "node:path";
import { pipeline } from "node:stream/promises";
import type { Request } from "express";
import busboy from "busboy";
import { InvalidParameterError, PayloadTooLargeError, UnsupportedMediaError, errorMessage } from "@local-stt/engine";

export const ALLOWED_MIME = new Set([
  "audio/wav",
  "audio/x-wav",
  "audio/mpeg",
  "audio/mp3",
  "audio/mp4",
  "audio/x-m4a",
  "audio/flac",
  "audio/ogg",
  "video/mp4",
  "application/octet-stream",
]);

export const ALLOWED_EXT = new Set([".wav", ".mp3", ".m4a", ".mp4", ".flac", ".ogg"]);

export const FILE_FIELD = "file";

// busboy reports a part without a Content-Type header as text/plain.
const UNDECLARED_MIME = "text/plain";

export interface UploadLimits {
  maxUploadMB: number;
}

export interface UploadedFile {
  path: string;
  filename: string;
  mimeType: string;
  bytes: number;
}

/** Returns the reason a part is refused, or null when it may be stored. */
export const checkMedia = (filename: string, mimeType: string): UnsupportedMediaError | null => {
  const mime = mimeType.trim().toLowerCase();
  if (mime && mime !== UNDECLARED_MIME && !ALLOWED_MIME.has(mime)) {
    return new UnsupportedMediaError(`Unsupported content-type: ${mimeType}`);
  }
  const ext = path.extname(filename).toLowerCase();
  if (ext && !ALLOWED_EXT.has(ext)) {
    return new UnsupportedMediaError(`Unsupported file extension: ${ext}`);
  }
  return null;
};

/**
 * Streams the `file` part of a multipart body into `dir`. Bytes past the limit
 * are discarded as they arrive; the promise settles once the whole request
 * has been read.
 */
export const receiveUpload = (req: Request, dir: string, limits: UploadLimits): Promise<UploadedFile> =>
  new Promise<UploadedFile>((resolve, reject) => {
    const maxBytes = limits.maxUploadMB * 1024 * 1024;

    let parser: busboy.Busboy;
    try {
      parser = busboy({ headers: req.headers, limits: { fileSize: maxBytes } });
    } catch (err) {
      reject(
        new InvalidParameterError(
          FILE_FIELD,
          `Expected a multipart/form-data body with a "${FILE_FIELD}" part (${errorMessage(err)})`,
        ),
      );
      return;
    }

    let refused: Error | null = null;
    let stored: UploadedFile | null = null;
    let written: Promise<void> = Promise.resolve();

    parser.on("file", (field, stream, info) => {
      if (field !== FILE_FIELD || stored || refused) {
        stream.resume();
        return;
      }

      const filename = info.filename ?? "";
      const mediaError = checkMedia(filename, info.mimeType ?? "");
      if (mediaError) {
        refused = mediaError;
        stream.resume();
        return;
      }

      const ext = path.extname(filename).toLowerCase();
      const file: UploadedFile = {
        path: path.join(dir, `upload${ext || ".bin"}`),
        filename,
        mimeType: info.mimeType,
        bytes: 0,
      };
      stored = file;

      stream.on("data", (chunk: Buffer) => {
        file.bytes += chunk.length;
      });
      stream.on("limit", () => {
        refused = new PayloadTooLargeError(maxBytes, `File too large (>${limits.maxUploadMB}MB).`);
      });

      written = pipeline(stream, createWriteStream(file.path)).catch((err: unknown) => {
        refused ??= err instanceof Error ? err : new Error(String(err));
      });
    });

    parser.on("error", (err: unknown) => {
      req.unpipe(parser);
      req.resume();
      reject(new InvalidParameterError(FILE_FIELD, `Malformed multipart body (${errorMessage(err)})`));
    });

    parser.on("close", () => {
      written.then(() => {
        if (refused) {
          reject(refused);
        } else if (!stored) {
          reject(new InvalidParameterError(FILE_FIELD, `Missing "${FILE_FIELD}" part in multipart body`));
        } else {
          resolve(stored);
        }
      }, reject);
    });

    req.pipe(parser);
  });
