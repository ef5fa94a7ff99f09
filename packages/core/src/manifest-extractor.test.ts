import { describe, expect, it } from 'vitest';
import { createManifestDocument } from './documents.js';
import {
  extractLifecycleType,
  extractManifestField,
  findMultilineElements,
  hasLifecycleState,
  matchManifestLine,
  resolveWhitespace,
} from './manifest-extractor.js';

const manifest = createManifestDocument(
  'addon.xml',
  [
    '<?xml version="1.0" encoding="UTF-8" standalone="yes"?>',
    '<addon id="plugin.video.example" name="Example" version="1.0.0" provider-name="tester">',
    '  <extension point="xbmc.addon.metadata">',
    '\t<description lang=\'fr_FR\'>Bonjour</description>',
    '    <summary lang="en_GB">Hello</summary>',
    '    <summary lang="de_DE">Hallo</summary>  ',
    '    <description lang="en_GB">First line',
    '      second line</description>',
    '    <lifecyclestate lang="en_GB" type="deprecated">Use the new one</lifecyclestate>',
    '  </extension>',
    '</addon>',
    '',
  ].join('\n')
);

describe('matchManifestLine', () => {
  it('captures indentation, language and body', () => {
    expect(matchManifestLine('\t<description lang=\'fr_FR\'>Bonjour</description>\n', 'description')).toEqual({
      whitespace: '\t',
      languageCode: 'fr_FR',
      body: 'Bonjour',
    });
  });

  it('rejects unknown attributes and empty bodies', () => {
    expect(matchManifestLine('<summary lang="en_GB" id="x">Hi</summary>', 'summary')).toBeNull();
    expect(matchManifestLine('<summary lang="en_GB"></summary>', 'summary')).toBeNull();
    expect(matchManifestLine('<summary>Hi</summary>', 'summary')).toBeNull();
  });

  it('ignores content after the closing tag', () => {
    expect(matchManifestLine('<summary lang="en_GB">Hi</summary> <!-- short -->\n', 'summary')).toEqual({
      whitespace: '',
      languageCode: 'en_GB',
      body: 'Hi',
    });
  });

  it('reads the lifecycle type on either side of lang', () => {
    expect(
      matchManifestLine('<lifecyclestate type="broken" lang="en_GB">Gone</lifecyclestate>', 'lifecyclestate')
    ).toEqual({ whitespace: '', languageCode: 'en_GB', body: 'Gone', type: 'broken' });
  });
});

describe('extractManifestField', () => {
  it('returns single-line elements in document order', () => {
    expect(extractManifestField(manifest, 'summary')).toEqual([
      { whitespace: '    ', languageCode: 'en_GB', body: 'Hello', line: 4 },
      { whitespace: '    ', languageCode: 'de_DE', body: 'Hallo', line: 5 },
    ]);
  });

  it('skips elements spanning several lines', () => {
    expect(extractManifestField(manifest, 'description').map((entry) => entry.languageCode)).toEqual(['fr_FR']);
    expect(findMultilineElements(manifest, 'description')).toEqual([6]);
  });
});

describe('lifecycle state', () => {
  it('detects the element and its type', () => {
    expect(hasLifecycleState(manifest)).toBe(true);
    expect(extractLifecycleType(manifest)).toBe('deprecated');
  });

  it('reports no type when the manifest has none', () => {
    const plain = createManifestDocument('addon.xml', '<summary lang="en_GB">Hi</summary>\n');
    expect(hasLifecycleState(plain)).toBe(false);
    expect(extractLifecycleType(plain)).toBeUndefined();
  });

  it('ignores a commented-out lifecycle element', () => {
    const commented = createManifestDocument(
      'addon.xml',
      '    <!-- <lifecyclestate type="broken" lang="en_GB">Gone</lifecyclestate> -->\n'
    );
    expect(hasLifecycleState(commented)).toBe(false);
    expect(extractLifecycleType(commented)).toBeUndefined();
  });
});

describe('resolveWhitespace', () => {
  it('prefers the description indentation', () => {
    const entries = {
      summary: extractManifestField(manifest, 'summary'),
      description: extractManifestField(manifest, 'description'),
    };
    expect(resolveWhitespace(manifest, entries)).toBe('\t');
  });

  it('falls back to other metadata lines, then to the extension indentation', () => {
    const withPlatform = createManifestDocument(
      'addon.xml',
      '<addon>\n  <extension point="xbmc.addon.metadata">\n      <platform>all</platform>\n  </extension>\n</addon>\n'
    );
    expect(resolveWhitespace(withPlatform, {})).toBe('      ');

    const bare = createManifestDocument('addon.xml', '<addon>\n  <extension point="xbmc.addon.metadata">\n');
    expect(resolveWhitespace(bare, {}, bare.lines[1])).toBe('      ');
  });
});
