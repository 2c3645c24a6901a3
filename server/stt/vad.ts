/**
 * Voice Activity Detection (VAD)
 *
 * Energy-based detection over PCM16LE mono frames: RMS energy, smoothed over
 * a short window, mapped to a speech probability.
 */

export interface VADConfig {
  energyThreshold: number;
  silenceThreshold: number;
  smoothingFrames: number;
}

export interface VADResult {
  isSpeech: boolean;
  energy: number;
  probability: number;
}

export interface VADStats {
  framesProcessed: number;
  speechFrames: number;
  silenceFrames: number;
  speechRatio: number;
}

const DEFAULT_CONFIG: VADConfig = {
  energyThreshold: 0.01,
  silenceThreshold: 0.005,
  smoothingFrames: 3,
};

export function rmsEnergy(pcm: Buffer): number {
  const samples = Math.floor(pcm.length / 2);
  if (samples === 0) return 0;

  let sumSquares = 0;
  for (let i = 0; i < samples; i++) {
    const normalized = pcm.readInt16LE(i * 2) / 32768;
    sumSquares += normalized * normalized;
  }

  return Math.sqrt(sumSquares / samples);
}

export class VoiceActivityDetector {
  private readonly config: VADConfig;
  private readonly energyHistory: number[] = [];
  private readonly stats = {
    framesProcessed: 0,
    speechFrames: 0,
    silenceFrames: 0,
  };

  constructor(config: Partial<VADConfig> = {}) {
    const energyThreshold = config.energyThreshold ?? DEFAULT_CONFIG.energyThreshold;
    this.config = {
      energyThreshold,
      silenceThreshold: config.silenceThreshold ?? energyThreshold / 2,
      smoothingFrames: Math.max(1, config.smoothingFrames ?? DEFAULT_CONFIG.smoothingFrames),
    };
  }

  classify(pcm: Buffer): VADResult {
    const energy = this.smoothEnergy(rmsEnergy(pcm));
    const probability = this.energyToProbability(energy);
    const isSpeech = probability >= 0.5;

    this.stats.framesProcessed++;
    if (isSpeech) {
      this.stats.speechFrames++;
    } else {
      this.stats.silenceFrames++;
    }

    return { isSpeech, energy, probability };
  }

  private smoothEnergy(energy: number): number {
    this.energyHistory.push(energy);

    if (this.energyHistory.length > this.config.smoothingFrames) {
      this.energyHistory.shift();
    }

    const sum = this.energyHistory.reduce((a, b) => a + b, 0);
    return sum / this.energyHistory.length;
  }

  private energyToProbability(energy: number): number {
    const { energyThreshold: threshold, silenceThreshold } = this.config;

    if (energy < silenceThreshold) {
      return 0;
    }

    if (energy >= threshold) {
      return Math.min(1, 0.5 + (energy - threshold) / threshold);
    }

    return 0.5 * (energy - silenceThreshold) / (threshold - silenceThreshold);
  }

  getStats(): VADStats {
    const total = this.stats.speechFrames + this.stats.silenceFrames;
    return {
      ...this.stats,
      speechRatio: total > 0 ? this.stats.speechFrames / total : 0,
    };
  }
}
