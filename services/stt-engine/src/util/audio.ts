import fs from "node:fs/promises";

export const PCM16_SAMPLE_RATE = 16_000;

const WAV_HEADER_BYTES = 44;

/** RIFF/WAVE container around little-endian 16-bit mono PCM. */
export const encodeWavPcm16Mono = (pcm16: Buffer, sampleRate: number = PCM16_SAMPLE_RATE): Buffer => {
  const numChannels = 1;
  const bitsPerSample = 16;
  const byteRate = (sampleRate * numChannels * bitsPerSample) / 8;
  const blockAlign = (numChannels * bitsPerSample) / 8;

  const dataSize = pcm16.length;
  const header = Buffer.alloc(WAV_HEADER_BYTES);

  header.write("RIFF", 0);
  header.writeUInt32LE(36 + dataSize, 4);
  header.write("WAVE", 8);
  header.write("fmt ", 12);
  header.writeUInt32LE(16, 16); // PCM
  header.writeUInt16LE(1, 20); // audio format
  header.writeUInt16LE(numChannels, 22);
  header.writeUInt32LE(sampleRate, 24);
  header.writeUInt32LE(byteRate, 28);
  header.writeUInt16LE(blockAlign, 32);
  header.writeUInt16LE(bitsPerSample, 34);
  header.write("data", 36);
  header.writeUInt32LE(dataSize, 40);

  return Buffer.concat([header, pcm16]);
};

export const writeWavPcm16Mono = async (
  path: string,
  pcm16: Buffer,
  sampleRate: number = PCM16_SAMPLE_RATE,
): Promise<void> => {
  await fs.writeFile(path, encodeWavPcm16Mono(pcm16, sampleRate));
};
