import { existsSync } from "node:fs";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { SttEngine, normalizeLanguage } from "./engine";
import { InvalidParameterError } from "./errors";
import type { InferenceHandle, InferenceOutput, InferenceParams, ModelLoader, TranscriptionResult } from "./types";
import { encodeWavPcm16Mono } from "./util/audio";

function delay(ms: number) {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

const HELLO_WORLD: InferenceOutput = {
  segments: [{ text: " hello" }, { text: " world" }],
  info: { language: "en", languageProbability: 0.9 },
};

class FakeHandle implements InferenceHandle {
  calls: Array<{ audioPath: string; params: InferenceParams }> = [];

  constructor(private readonly output: InferenceOutput) {}

  async transcribe(audioPath: string, params: InferenceParams): Promise<InferenceOutput> {
    this.calls.push({ audioPath, params });
    return this.output;
  }
}

class FakeLoader implements ModelLoader {
  loads = 0;
  handles: FakeHandle[] = [];
  failuresLeft = 0;

  constructor(
    private readonly output: InferenceOutput = HELLO_WORLD,
    private readonly loadDelayMs = 0,
  ) {}

  async load(): Promise<InferenceHandle> {
    this.loads += 1;
    await delay(this.loadDelayMs);
    if (this.failuresLeft > 0) {
      this.failuresLeft -= 1;
      throw new Error("weights unavailable");
    }
    const handle = new FakeHandle(this.output);
    this.handles.push(handle);
    return handle;
  }
}

const EMPTY: TranscriptionResult = {
  text: "",
  detectedLanguage: null,
  languageProbability: null,
  elapsedSeconds: 0,
};

describe("SttEngine", () => {
  let tmpRoot: string;
  let audioPath: string;
  let loader: FakeLoader;
  let engine: SttEngine;

  const makeEngine = (l: FakeLoader) =>
    new SttEngine({ model: "tiny", loader: l, deviceConfig: { device: "cpu", threads: 1 }, tmpDir: tmpRoot });

  beforeEach(async () => {
    tmpRoot = await fs.mkdtemp(path.join(os.tmpdir(), "stt-engine-test-"));
    audioPath = path.join(tmpRoot, "audio.wav");
    await fs.writeFile(audioPath, encodeWavPcm16Mono(Buffer.alloc(320)));
    loader = new FakeLoader();
    engine = makeEngine(loader);
  });

  afterEach(async () => {
    await fs.rm(tmpRoot, { recursive: true, force: true });
  });

  describe("transcribe", () => {
    it("returns the empty result for a missing file without loading the model", async () => {
      const res = await engine.transcribe(path.join(tmpRoot, "does_not_exist.wav"));
      expect(res).toEqual(EMPTY);
      expect(loader.loads).toBe(0);
      expect(engine.isReady).toBe(false);
    });

    it("returns the empty result for an empty path without loading the model", async () => {
      const res = await engine.transcribe("");
      expect(res).toEqual(EMPTY);
      expect(loader.loads).toBe(0);
    });

    it("rejects beam sizes outside 1..10 before loading the model", async () => {
      const emptyFile = path.join(tmpRoot, "empty.wav");
      await fs.writeFile(emptyFile, Buffer.alloc(0));

      for (const file of [audioPath, emptyFile]) {
        await expect(engine.transcribe(file, { beamSize: 0 })).rejects.toBeInstanceOf(InvalidParameterError);
        await expect(engine.transcribe(file, { beamSize: 11 })).rejects.toBeInstanceOf(InvalidParameterError);
        await expect(engine.transcribe(file, { beamSize: 2.5 })).rejects.toBeInstanceOf(InvalidParameterError);
      }
      expect(loader.loads).toBe(0);
    });

    it("joins segments in order without separators and trims the text", async () => {
      const res = await engine.transcribe(audioPath, { language: "en", beamSize: 5, voiceActivityFilter: true });

      expect(res.text).toBe("hello world");
      expect(res.detectedLanguage).toBe("en");
      expect(res.languageProbability).toBe(0.9);
      expect(res.elapsedSeconds).toBeGreaterThanOrEqual(0);
      expect(Object.isFrozen(res)).toBe(true);
      expect(loader.handles[0].calls).toEqual([
        { audioPath, params: { language: "en", beamSize: 5, voiceActivityFilter: true } },
      ]);
    });

    it("applies defaults and treats blank or auto language as auto-detect", async () => {
      await engine.transcribe(audioPath);
      await engine.transcribe(audioPath, { language: "   ", beamSize: 1, voiceActivityFilter: false });
      await engine.transcribe(audioPath, { language: "auto" });

      expect(loader.handles[0].calls.map((c) => c.params)).toEqual([
        { language: null, beamSize: 5, voiceActivityFilter: true },
        { language: null, beamSize: 1, voiceActivityFilter: false },
        { language: null, beamSize: 5, voiceActivityFilter: true },
      ]);
    });

    it("passes through a missing confidence signal", async () => {
      const pinned = new FakeLoader({
        segments: [{ text: "Hallo" }],
        info: { language: "de", languageProbability: null },
      });
      const res = await makeEngine(pinned).transcribe(audioPath, { language: "de" });
      expect(res).toMatchObject({ text: "Hallo", detectedLanguage: "de", languageProbability: null });
    });

    it("loads the model once for concurrent first calls", async () => {
      const slow = new FakeLoader(HELLO_WORLD, 50);
      const fresh = makeEngine(slow);

      const results = await Promise.all(Array.from({ length: 8 }, () => fresh.transcribe(audioPath)));

      expect(slow.loads).toBe(1);
      expect(slow.handles).toHaveLength(1);
      expect(slow.handles[0].calls).toHaveLength(8);
      expect(results.map((r) => r.text)).toEqual(Array(8).fill("hello world"));
      expect(fresh.isReady).toBe(true);
    });

    it("shares a failed initialization with every waiter and retries on the next call", async () => {
      const flaky = new FakeLoader(HELLO_WORLD, 50);
      flaky.failuresLeft = 1;
      const fresh = makeEngine(flaky);

      const first = await Promise.allSettled([fresh.transcribe(audioPath), fresh.transcribe(audioPath)]);
      expect(first.map((r) => r.status)).toEqual(["rejected", "rejected"]);
      expect(flaky.loads).toBe(1);
      expect(fresh.isReady).toBe(false);

      const res = await fresh.transcribe(audioPath);
      expect(res.text).toBe("hello world");
      expect(flaky.loads).toBe(2);
    });

    it("propagates inference errors untranslated", async () => {
      const boom = new Error("decoder crashed");
      const failing: ModelLoader = {
        load: async () => ({
          transcribe: async () => {
            throw boom;
          },
        }),
      };
      const fresh = new SttEngine({ model: "base", loader: failing, deviceConfig: { device: "gpu", threads: 2 } });
      await expect(fresh.transcribe(audioPath)).rejects.toBe(boom);
    });
  });

  describe("transcribePcm", () => {
    const pcm = Buffer.alloc(16_000 * 2);

    it("returns the empty result for empty bytes without touching the temp dir", async () => {
      const spy = vi.spyOn(engine, "transcribe");
      const res = await engine.transcribePcm(Buffer.alloc(0));

      expect(res).toEqual(EMPTY);
      expect(spy).not.toHaveBeenCalled();
      expect(loader.loads).toBe(0);
      expect(await fs.readdir(tmpRoot)).toEqual(["audio.wav"]);
    });

    it("writes one temporary WAV, transcribes it, then removes it", async () => {
      let seenPath = "";
      let entriesDuringCall: string[] = [];
      let header = Buffer.alloc(0);

      vi.spyOn(engine, "transcribe").mockImplementation(async (p: string) => {
        seenPath = p;
        expect(existsSync(p)).toBe(true);
        entriesDuringCall = await fs.readdir(tmpRoot);
        header = await fs.readFile(p);
        return { text: "ok", detectedLanguage: "en", languageProbability: 1, elapsedSeconds: 0.01 };
      });

      const res = await engine.transcribePcm(pcm, 16_000);

      expect(res.text).toBe("ok");
      expect(entriesDuringCall.filter((e) => e !== "audio.wav")).toHaveLength(1);
      expect(header.toString("ascii", 0, 4)).toBe("RIFF");
      expect(header.readUInt32LE(24)).toBe(16_000);
      expect(header.length).toBe(44 + pcm.length);
      expect(existsSync(seenPath)).toBe(false);
      expect(await fs.readdir(tmpRoot)).toEqual(["audio.wav"]);
    });

    it("removes the temporary WAV when transcription throws", async () => {
      let seenPath = "";
      vi.spyOn(engine, "transcribe").mockImplementation(async (p: string) => {
        seenPath = p;
        throw new Error("inference failed");
      });

      await expect(engine.transcribePcm(pcm)).rejects.toThrow("inference failed");
      expect(seenPath).not.toBe("");
      expect(existsSync(seenPath)).toBe(false);
      expect(await fs.readdir(tmpRoot)).toEqual(["audio.wav"]);
    });

    it("removes the temporary WAV when parameters are rejected", async () => {
      await expect(engine.transcribePcm(pcm, 16_000, { beamSize: 0 })).rejects.toBeInstanceOf(InvalidParameterError);
      expect(loader.loads).toBe(0);
      expect(await fs.readdir(tmpRoot)).toEqual(["audio.wav"]);
    });

    it("transcribes real PCM through the loaded handle", async () => {
      const res = await engine.transcribePcm(pcm, 8_000, { language: "en" });
      expect(res.text).toBe("hello world");
      expect(loader.handles[0].calls[0].params.language).toBe("en");
      expect(await fs.readdir(tmpRoot)).toEqual(["audio.wav"]);
    });

    it("rejects a non-positive sample rate", async () => {
      await expect(engine.transcribePcm(pcm, 0)).rejects.toBeInstanceOf(InvalidParameterError);
    });

    it("rejects a partial trailing sample before writing anything", async () => {
      await expect(engine.transcribePcm(Buffer.alloc(3))).rejects.toThrow(
        "16-bit PCM must have an even byte length (got 3)",
      );
      expect(loader.loads).toBe(0);
      expect(await fs.readdir(tmpRoot)).toEqual(["audio.wav"]);
    });
  });
});

describe("normalizeLanguage", () => {
  it("maps blank, auto and null to auto-detect", () => {
    expect(normalizeLanguage(undefined)).toBeNull();
    expect(normalizeLanguage(null)).toBeNull();
    expect(normalizeLanguage("")).toBeNull();
    expect(normalizeLanguage(" AUTO ")).toBeNull();
    expect(normalizeLanguage(" de ")).toBe("de");
  });
});
