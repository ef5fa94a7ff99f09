import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { MissingPreconditionError } from './errors.js';
import { listPackageDirectories, loadAddonPackage, writeDocument } from './package-loader.js';

describe('package loader', () => {
  let tempDir: string;

  const writeFile = async (relativePath: string, content: string) => {
    const filePath = path.join(tempDir, relativePath);
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, content);
    return filePath;
  };

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'metasync-loader-'));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('loads the manifest and catalogs in path order', async () => {
    await writeFile('addon.xml', '<addon/>\n');
    await writeFile('resources/language/resource.language.en_gb/strings.po', 'msgid ""\n');
    await writeFile('resources/language/resource.language.de_de/strings.po', 'msgid ""\nmsgstr ""\n');
    await writeFile('node_modules/x/resource.language.fr_fr/strings.po', '');

    const pkg = await loadAddonPackage(tempDir);

    expect(pkg.manifest.lines).toEqual(['<addon/>\n']);
    expect(pkg.catalogs.map((catalog) => catalog.languageCode)).toEqual(['de_DE', 'en_GB']);
    expect(pkg.catalogs[0].lines).toEqual(['msgid ""\n', 'msgstr ""\n']);
  });

  it('honours a custom manifest name and catalog globs', async () => {
    await writeFile('addon.xml.in', '<addon/>\n');
    await writeFile('po/resource.language.en_gb/strings.po.in', '');
    await writeFile('resources/language/resource.language.de_de/strings.po', '');

    const pkg = await loadAddonPackage(tempDir, {
      manifestFile: 'addon.xml.in',
      catalogGlobs: ['po/**/*.po.in'],
    });

    expect(pkg.manifest.path).toBe(path.join(tempDir, 'addon.xml.in'));
    expect(pkg.catalogs.map((catalog) => catalog.languageCode)).toEqual(['en_GB']);
  });

  it('fails without a manifest', async () => {
    await expect(loadAddonPackage(tempDir)).rejects.toBeInstanceOf(MissingPreconditionError);
    await expect(loadAddonPackage(tempDir)).rejects.toMatchObject({ reason: 'missing-manifest' });
  });

  it('writes the joined line sequence', async () => {
    const filePath = await writeFile('addon.xml', 'old\n');

    await writeDocument(filePath, ['<addon>\n', '</addon>\n']);

    expect(await fs.readFile(filePath, 'utf8')).toBe('<addon>\n</addon>\n');
    expect(await fs.readdir(tempDir)).toEqual(['addon.xml']);
  });

  it('lists package directories', async () => {
    await writeFile('plugin.video.b/addon.xml', '');
    await writeFile('plugin.video.a/addon.xml', '');
    await writeFile('.git/config', '');
    await writeFile('node_modules/x/index.js', '');
    await writeFile('README.md', '');

    expect(await listPackageDirectories(tempDir)).toEqual([
      path.join(tempDir, 'plugin.video.a'),
      path.join(tempDir, 'plugin.video.b'),
    ]);
  });
});
