#!/usr/bin/env -S npx tsx
/*
  Transcribe a file locally (engine in-process) or through a running stt api.

  Examples:
    npm run transcribe -- ./clip.wav --model small --language en
    npm run transcribe -- ./clip.wav --remote http://localhost:8000 --beam-size 3 --no-vad
    npm run transcribe -- ./clip.s16le --pcm --sample-rate 16000 --local

  STT_API_URL switches to remote mode unless --local is given.
*/

import "dotenv/config";
import { createEngineCache, errorMessage, loadEngineConfig } from "@local-stt/engine";
import { parseCliArgs, runCli } from "./command";
import { transcribeRemote } from "./remote";

const main = async () => {
  const args = parseCliArgs(process.argv.slice(2));
  process.exitCode = await runCli(args, {
    engine: (model) => createEngineCache(loadEngineConfig()).get(model),
    transcribeRemote,
    write: (text) => process.stdout.write(text),
  });
};

main().catch((e: unknown) => {
  // eslint-disable-next-line no-console
  console.error(errorMessage(e));
  process.exit(1);
});
