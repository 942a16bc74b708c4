import { describe, it, expect } from 'vitest';
import {
  FormatValidatorService,
  extractExtension,
} from '../../../src/shared/validation/format-validator.service';
import { createConfigService, createTestConfig } from '../helpers/mock-factories';

describe('FormatValidatorService', () => {
  const validator = new FormatValidatorService(createConfigService());

  it('should accept the default container formats', () => {
    expect(validator.getAcceptedFormats()).toEqual(['.mp4', '.mov', '.avi', '.mkv', '.m4v']);
    expect(validator.isSupported('clip.mp4')).toBe(true);
    expect(validator.isSupported('clip.mkv')).toBe(true);
  });

  it('should compare extensions case-insensitively', () => {
    expect(validator.isSupported('CLIP.MOV')).toBe(true);
  });

  it('should reject other extensions and names without one', () => {
    expect(validator.isSupported('notes.txt')).toBe(false);
    expect(validator.isSupported('clip')).toBe(false);
    expect(validator.isSupported('clip.mp4.txt')).toBe(false);
  });

  it('should follow the configured list', () => {
    const webmOnly = new FormatValidatorService(
      createConfigService(createTestConfig({ SUPPORTED_FORMATS: 'WEBM' })),
    );

    expect(webmOnly.isSupported('clip.webm')).toBe(true);
    expect(webmOnly.isSupported('clip.mp4')).toBe(false);
  });

  it('should ignore directory parts when extracting the extension', () => {
    expect(extractExtension('uploads.d\\clip')).toBe('');
    expect(extractExtension('a.b/clip.MP4')).toBe('.mp4');
  });
});
