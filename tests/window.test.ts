import { describe, it, expect } from 'vitest';
import { ConfigurationError } from '../src/pipeline/errors';
import { windowChunks } from '../src/pipeline/window';

const SR = 16000;

describe('windowChunks', () => {
  it('should step by chunkDuration - overlap and truncate the last window', () => {
    const chunks = windowChunks(620 * SR, SR, { chunkDuration: 300, overlap: 5 });
    expect(chunks.map((c) => c.start / SR)).toEqual([0, 295, 590]);
    expect(chunks[2]).toEqual({ start: 590 * SR, end: 620 * SR });
    expect((chunks[2].end - chunks[2].start) / SR).toBe(30);
  });

  it('should produce back-to-back windows without overlap', () => {
    expect(windowChunks(600 * SR, SR, { chunkDuration: 300, overlap: 0 })).toEqual([
      { start: 0, end: 300 * SR },
      { start: 300 * SR, end: 600 * SR },
    ]);
  });

  it('should return one window for audio shorter than a chunk', () => {
    expect(windowChunks(12 * SR, SR, { chunkDuration: 300, overlap: 5 })).toEqual([
      { start: 0, end: 12 * SR },
    ]);
  });

  it('should return no windows for empty audio', () => {
    expect(windowChunks(0, SR, { chunkDuration: 300, overlap: 5 })).toEqual([]);
  });

  it('should reject overlap equal to or longer than the chunk', () => {
    expect(() => windowChunks(SR, SR, { chunkDuration: 10, overlap: 10 })).toThrow(ConfigurationError);
    expect(() => windowChunks(SR, SR, { chunkDuration: 10, overlap: 12 })).toThrow(ConfigurationError);
  });

  it('should reject negative durations', () => {
    expect(() => windowChunks(SR, SR, { chunkDuration: -1, overlap: 0 })).toThrow(ConfigurationError);
    expect(() => windowChunks(SR, SR, { chunkDuration: 10, overlap: -1 })).toThrow(ConfigurationError);
  });

  it('should reject a window shorter than one sample', () => {
    expect(() => windowChunks(10, 1, { chunkDuration: 0.4, overlap: 0 })).toThrow(ConfigurationError);
  });
});
