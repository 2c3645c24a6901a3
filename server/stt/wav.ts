const BITS_PER_SAMPLE = 16;

function createWavHeader(dataLength: number, sampleRate: number, channels = 1): Buffer {
  const header = Buffer.alloc(44);
  const byteRate = sampleRate * channels * (BITS_PER_SAMPLE / 8);
  const blockAlign = channels * (BITS_PER_SAMPLE / 8);

  header.write("RIFF", 0);
  header.writeUInt32LE(36 + dataLength, 4);
  header.write("WAVE", 8);
  header.write("fmt ", 12);
  header.writeUInt32LE(16, 16);
  header.writeUInt16LE(1, 20);
  header.writeUInt16LE(channels, 22);
  header.writeUInt32LE(sampleRate, 24);
  header.writeUInt32LE(byteRate, 28);
  header.writeUInt16LE(blockAlign, 32);
  header.writeUInt16LE(BITS_PER_SAMPLE, 34);
  header.write("data", 36);
  header.writeUInt32LE(dataLength, 40);

  return header;
}

export function pcmToWav(pcmBuffer: Buffer, sampleRate: number): Buffer {
  const header = createWavHeader(pcmBuffer.length, sampleRate);
  return Buffer.concat([header, pcmBuffer]);
}

/** Duration in milliseconds of a PCM16 mono buffer */
export function pcmDurationMs(byteLength: number, sampleRate: number): number {
  const samples = Math.floor(byteLength / 2);
  return (samples / sampleRate) * 1000;
}
