import { afterEach, describe, expect, it, vi } from 'vitest';
import { DEFAULT_MAX_PATTERN_LENGTH, emitProcessWarning, normalizeEngineConfig } from './config.js';

afterEach(() => {
  vi.restoreAllMocks();
});

describe('normalizeEngineConfig', () => {
  it('fills in defaults', () => {
    const config = normalizeEngineConfig();

    expect(config.logger.isEnabled).toBe(false);
    expect(config.maxPatternLength).toBe(DEFAULT_MAX_PATTERN_LENGTH);
    expect(config.onWarning).toBe(emitProcessWarning);
  });

  it('keeps the values it was given', () => {
    const onWarning = vi.fn();

    const config = normalizeEngineConfig({ enableLogging: true, maxPatternLength: 64, onWarning });

    expect(config.logger.isEnabled).toBe(true);
    expect(config.maxPatternLength).toBe(64);
    expect(config.onWarning).toBe(onWarning);
  });

  it('rejects a fractional pattern length limit', () => {
    expect(() => normalizeEngineConfig({ maxPatternLength: 1.5 })).toThrow(
      'maxPatternLength must be a positive integer, got 1.5.',
    );
  });
});

describe('emitProcessWarning', () => {
  it('emits the warning under its own type and code', () => {
    const emitWarning = vi.spyOn(process, 'emitWarning').mockImplementation(() => {});

    emitProcessWarning({ code: 'NO_MATCH', message: 'nothing found' });

    expect(emitWarning).toHaveBeenCalledWith('nothing found', { type: 'NoMatchWarning', code: 'NO_MATCH' });
  });
});
