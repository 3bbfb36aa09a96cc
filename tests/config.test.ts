import os from 'os';
import path from 'path';
import { describe, it, expect } from 'vitest';
import {
  parseMode,
  resolvePipelineConfig,
  validatePipelineConfig,
} from '../src/pipeline/config';
import { ConfigurationError } from '../src/pipeline/errors';
import { loadProfiles, parseProfiles, selectProfile } from '../src/pipeline/profiles';

describe('resolvePipelineConfig', () => {
  it('should apply layers in order, later layers winning', () => {
    const config = resolvePipelineConfig(
      { mode: 'window', window: { chunkDuration: 120, overlap: 4 } },
      { window: { overlap: 3 }, language: 'fr' }
    );
    expect(config.mode).toBe('window');
    expect(config.window).toEqual({ chunkDuration: 120, overlap: 3 });
    expect(config.language).toBe('fr');
  });

  it('should not let undefined values clobber earlier layers', () => {
    const config = resolvePipelineConfig(
      { mode: 'window', segments: { gapThreshold: 0.7 } },
      { mode: undefined, segments: { gapThreshold: undefined, maxDuration: 12 } }
    );
    expect(config.mode).toBe('window');
    expect(config.segments.gapThreshold).toBe(0.7);
    expect(config.segments.maxDuration).toBe(12);
  });

  it('should reject overlap not shorter than the window', () => {
    expect(() => resolvePipelineConfig({ window: { chunkDuration: 10, overlap: 10 } })).toThrow(
      ConfigurationError
    );
  });

  it('should reject negative durations', () => {
    expect(() => resolvePipelineConfig({ vad: { mergeGap: -1 } })).toThrow('mergeGap must not be negative');
    expect(() => resolvePipelineConfig({ segments: { maxDuration: 0 } })).toThrow(
      'maxDuration must be greater than zero'
    );
  });
});

describe('validatePipelineConfig', () => {
  it('should reject a fractional sample rate', () => {
    const config = resolvePipelineConfig();
    expect(() => validatePipelineConfig({ ...config, sampleRate: 16000.5 })).toThrow(ConfigurationError);
  });

  it('should reject an empty engine command', () => {
    expect(() => resolvePipelineConfig({ engine: { bin: '' } })).toThrow('engine.bin must not be empty');
  });

  it('should reject an empty language code', () => {
    const config = resolvePipelineConfig();
    expect(() => validatePipelineConfig({ ...config, language: ' ' })).toThrow('language must not be empty');
  });
});

describe('parseMode', () => {
  it('should reject unknown modes', () => {
    expect(parseMode('window')).toBe('window');
    expect(() => parseMode('stream')).toThrow('mode must be one of vad, window');
  });
});

describe('profiles', () => {
  it('should always provide the default profile', () => {
    const profiles = parseProfiles({ fast: { mode: 'window' } });
    expect(profiles.default).toEqual({});
    expect(profiles.fast.mode).toBe('window');
  });

  it('should parse nested sections', () => {
    const profiles = parseProfiles({
      subword: { segments: { breakPolicy: 'word-boundary', join: 'concat' }, vad: { splitGap: 0.3 } },
    });
    expect(profiles.subword.segments?.breakPolicy).toBe('word-boundary');
    expect(profiles.subword.segments?.join).toBe('concat');
    expect(profiles.subword.vad?.splitGap).toBe(0.3);
  });

  it('should reject values of the wrong type', () => {
    expect(() => parseProfiles({ bad: { vad: { mergeGap: 'ten' } } })).toThrow(
      'Profile bad: "mergeGap" must be a number'
    );
    expect(() => parseProfiles({ bad: { segments: { breakPolicy: 'sometimes' } } })).toThrow(
      ConfigurationError
    );
    expect(() => parseProfiles([])).toThrow(ConfigurationError);
  });

  it('should parse an engine section with listed or space-separated args', () => {
    const profiles = parseProfiles({
      cpu: { engine: { bin: 'words-cpu', args: ['--device', 'cpu'] } },
      gpu: { engine: { args: '--device  cuda' } },
    });
    expect(profiles.cpu.engine).toEqual({ bin: 'words-cpu', args: ['--device', 'cpu'] });
    expect(profiles.gpu.engine).toEqual({ bin: undefined, args: ['--device', 'cuda'] });
    expect(() => parseProfiles({ bad: { engine: { args: ['--device', 1] } } })).toThrow(
      'Profile bad: "args" must be a string or a list of strings'
    );
  });

  it('should reject unknown profile names', () => {
    const profiles = parseProfiles({});
    expect(() => selectProfile(profiles, 'missing')).toThrow('Unknown profile: missing');
    expect(() => selectProfile(profiles, 'toString')).toThrow(ConfigurationError);
  });

  it('should fall back to the default profile when the file is missing', async () => {
    const profiles = await loadProfiles(path.join(os.tmpdir(), 'no-such-profiles.json'));
    expect(profiles).toEqual({ default: {} });
  });

  it('should load the bundled profiles file', async () => {
    const profiles = await loadProfiles(path.resolve('config/profiles.json'));
    expect(profiles['long-form'].mode).toBe('window');
    expect(profiles.subword.segments?.breakPolicy).toBe('word-boundary');
  });
});
