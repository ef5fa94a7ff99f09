import { describe, expect, it } from 'vitest';
import { createManifestDocument } from './documents.js';
import { MissingAnchorError } from './errors.js';
import {
  findManifestInsertIndex,
  regenerateManifest,
  renderManifestLines,
  stripManifestFields,
} from './manifest-writer.js';

const original = createManifestDocument(
  'addon.xml',
  [
    '<addon id="plugin.video.example" version="1.0.0">',
    '    <extension point="xbmc.python.pluginsource" library="main.py"/>',
    "    <extension point='xbmc.addon.metadata'>",
    '        <summary lang="en_GB">Hello</summary>',
    '        <platform>all</platform>',
    '        <description lang="en_GB">First line',
    '            second line</description>',
    '        <disclaimer lang="en_GB">Use at your own risk</disclaimer>',
    '    </extension>',
    '</addon>',
    '',
  ].join('\n')
);

describe('findManifestInsertIndex', () => {
  it('points at the closing tag of the metadata extension', () => {
    expect(findManifestInsertIndex(original.lines)).toBe(8);
  });

  it('falls back to the line after the opening tag', () => {
    expect(findManifestInsertIndex(['<addon>\n', '<extension point="xbmc.addon.metadata">\n', '</addon>\n'])).toBe(2);
  });

  it('throws without a metadata extension', () => {
    expect(() => findManifestInsertIndex(['<addon>\n', '</addon>\n'], 'addon.xml')).toThrow(MissingAnchorError);
  });
});

describe('stripManifestFields', () => {
  it('drops only complete single-line elements of the given kinds', () => {
    expect(stripManifestFields(original.lines, ['summary', 'description'])).toEqual([
      '<addon id="plugin.video.example" version="1.0.0">\n',
      '    <extension point="xbmc.python.pluginsource" library="main.py"/>\n',
      "    <extension point='xbmc.addon.metadata'>\n",
      '        <platform>all</platform>\n',
      '        <description lang="en_GB">First line\n',
      '            second line</description>\n',
      '        <disclaimer lang="en_GB">Use at your own risk</disclaimer>\n',
      '    </extension>\n',
      '</addon>\n',
    ]);
  });

  it('drops empty elements, extra attributes and trailing comments of a managed kind', () => {
    const lines = [
      '    <extension point="xbmc.addon.metadata">\n',
      '        <disclaimer lang="en_GB"></disclaimer>\n',
      '        <description lang="en_GB">Desc</description> <!-- keep short -->\n',
      '        <summary lang="en_GB" id="main">Hello</summary>\n',
      '        <summary>No language</summary>\n',
      '    </extension>\n',
    ];

    expect(stripManifestFields(lines, ['summary', 'description', 'disclaimer'])).toEqual([
      '    <extension point="xbmc.addon.metadata">\n',
      '        <summary>No language</summary>\n',
      '    </extension>\n',
    ]);
  });
});

describe('renderManifestLines', () => {
  it('renders one element per language', () => {
    expect(
      renderManifestLines(
        'summary',
        [
          { languageCode: 'en_GB', text: 'Hello' },
          { languageCode: 'de_DE', text: 'Hallo' },
        ],
        '  '
      )
    ).toEqual(['  <summary lang="en_GB">Hello</summary>\n', '  <summary lang="de_DE">Hallo</summary>\n']);
  });

  it('adds the lifecycle type and skips empty lifecycle bodies', () => {
    expect(
      renderManifestLines(
        'lifecyclestate',
        [
          { languageCode: 'en_GB', text: 'Broken' },
          { languageCode: 'de_DE', text: '' },
        ],
        '',
        'broken'
      )
    ).toEqual(['<lifecyclestate type="broken" lang="en_GB">Broken</lifecyclestate>\n']);
  });

  it('omits the type attribute when there is none', () => {
    expect(renderManifestLines('lifecyclestate', [{ languageCode: 'en_GB', text: 'Old' }], '')).toEqual([
      '<lifecyclestate lang="en_GB">Old</lifecyclestate>\n',
    ]);
  });
});

describe('regenerateManifest', () => {
  const fields = {
    summary: [
      { languageCode: 'en_GB', text: 'Hello' },
      { languageCode: 'de_DE', text: 'Hallo' },
    ],
    disclaimer: [{ languageCode: 'en_GB', text: 'Use at your own risk' }],
  };

  it('splices the fields in order before the closing tag', () => {
    const result = regenerateManifest(original, fields, { whitespace: '        ' });

    expect(result.changed).toBe(true);
    expect(result.document.lines.slice(3, 10)).toEqual([
      '        <platform>all</platform>\n',
      '        <description lang="en_GB">First line\n',
      '            second line</description>\n',
      '        <summary lang="en_GB">Hello</summary>\n',
      '        <summary lang="de_DE">Hallo</summary>\n',
      '        <disclaimer lang="en_GB">Use at your own risk</disclaimer>\n',
      '    </extension>\n',
    ]);
  });

  it('loses nothing but managed lines when they are stripped again', () => {
    const result = regenerateManifest(original, fields, { whitespace: '        ' });
    const kinds = ['summary', 'disclaimer'] as const;

    expect(stripManifestFields(result.document.lines, kinds)).toEqual(stripManifestFields(original.lines, kinds));
  });

  it('reports no change when regenerating its own output', () => {
    const first = regenerateManifest(original, fields, { whitespace: '        ' });
    const second = regenerateManifest(first.document, fields, { whitespace: '        ' });

    expect(second.changed).toBe(false);
    expect(second.document).toBe(first.document);
  });
});
