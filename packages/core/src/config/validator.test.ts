import { describe, it, expect } from 'vitest';
import { normalizeConfig } from './normalizer.js';
import { assertConfigValid, ConfigValidationError, validateConfig } from './validator.js';
import type { RawMetasyncConfig } from './types.js';

function validate(raw: RawMetasyncConfig) {
  return validateConfig(normalizeConfig(raw), raw);
}

describe('config normalizer', () => {
  it('fills in defaults', () => {
    expect(normalizeConfig({})).toEqual({
      manifestFile: 'addon.xml',
      catalogGlobs: ['**/resource.language.*/*.po'],
      exclude: ['**/node_modules/**', '**/.git/**'],
      referenceLanguage: 'en_GB',
      priority: 'catalog',
      direction: 'both',
      backup: { enabled: false, dir: '.metasync-backup', maxBackups: 5 },
    });
  });

  it('accepts a boolean backup flag and comma separated globs', () => {
    const config = normalizeConfig({ backup: true, catalogGlobs: 'a/*.po, b/*.po' });
    expect(config.backup.enabled).toBe(true);
    expect(config.catalogGlobs).toEqual(['a/*.po', 'b/*.po']);
  });
});

describe('config validator', () => {
  it('accepts a normalized default config', () => {
    expect(() => assertConfigValid(normalizeConfig({}))).not.toThrow();
  });

  it('rejects a manifest path outside the package root', () => {
    expect(validate({ manifestFile: '../addon.xml' }).map((issue) => issue.field)).toEqual(['manifestFile']);
  });

  it('rejects unknown priorities and directions', () => {
    expect(validate({ priority: 'both', direction: 'sideways' }).map((issue) => issue.field)).toEqual([
      'priority',
      'direction',
    ]);
  });

  it('rejects invalid language codes', () => {
    expect(validate({ referenceLanguage: 'english' }).map((issue) => issue.field)).toEqual(['referenceLanguage']);
  });

  it('lists every issue in the error', () => {
    const raw = { referenceLanguage: 'en gb', priority: 'nobody' };
    const config = normalizeConfig(raw);

    expect(() => assertConfigValid(config, raw)).toThrow(ConfigValidationError);
    expect(() => assertConfigValid(config, raw)).toThrow(
      'Invalid metasync configuration:\n• referenceLanguage: must be a language code such as "en_GB" or "fr"\n• priority: must be "catalog" or "manifest"'
    );
  });
});
