import { describe, expect, it } from 'vitest';
import {
  BACKEND_OPTIONS,
  GENERATION_SLIDERS,
  apiKeyField,
  formatSliderValue,
  formatWindowGeometry,
  modelField,
  pickOption,
  visibleSliders
} from '../src/lib/settingsOptions';

describe('pickOption', () => {
  it('keeps known values and falls back otherwise', () => {
    expect(pickOption(BACKEND_OPTIONS, 'openrouter', 'gemini')).toBe('openrouter');
    expect(pickOption(BACKEND_OPTIONS, 'claude', 'gemini')).toBe('gemini');
  });
});

describe('visibleSliders', () => {
  it('shows min-p and repeat penalty only for the local backend', () => {
    expect(visibleSliders('local').map((slider) => slider.key)).toEqual([
      'temperature',
      'topK',
      'topP',
      'minP',
      'repeatPenalty',
      'maxTokens'
    ]);
    expect(visibleSliders('xai').map((slider) => slider.key)).toEqual(['temperature', 'topK', 'topP', 'maxTokens']);
  });
});

describe('formatSliderValue', () => {
  it('rounds integer sliders and fixes fractional ones to two places', () => {
    const [temperature, topK] = GENERATION_SLIDERS;
    if (!temperature || !topK) {
      throw new Error('slider list is empty');
    }

    expect(formatSliderValue(temperature, 0.4)).toBe('0.40');
    expect(formatSliderValue(topK, 39.6)).toBe('40');
  });
});

describe('backend fields', () => {
  it('maps remote backends to their key and model settings', () => {
    expect(apiKeyField('gemini')).toBe('geminiApiKey');
    expect(modelField('openrouter')).toBe('openrouterModel');
    expect(apiKeyField('local')).toBeNull();
    expect(modelField('local')).toBeNull();
  });
});

describe('formatWindowGeometry', () => {
  it('rounds to whole pixels', () => {
    expect(formatWindowGeometry(1399.6, 900.2)).toBe('1400x900');
  });
});
