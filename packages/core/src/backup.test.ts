import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'fs/promises';
import path from 'path';
import os from 'os';
import { createBackup, listBackups, restoreBackup, type BackupResult } from './backup.js';

function assertBackup(result: BackupResult | null): BackupResult {
  if (!result) {
    throw new Error('expected a backup to be created');
  }
  return result;
}

describe('Backup', () => {
  let tempDir: string;
  let manifestPath: string;
  let catalogPath: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'metasync-backup-test-'));
    manifestPath = path.join(tempDir, 'addon.xml');
    catalogPath = path.join(tempDir, 'resources', 'language', 'resource.language.en_gb', 'strings.po');
    await fs.mkdir(path.dirname(catalogPath), { recursive: true });
    await fs.writeFile(manifestPath, '<addon/>\n');
    await fs.writeFile(catalogPath, 'msgid ""\nmsgstr ""\n');
  });

  afterEach(async () => {
    vi.useRealTimers();
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  describe('createBackup', () => {
    it('copies files and records them in the index', async () => {
      const result = assertBackup(await createBackup([manifestPath, catalogPath], tempDir, {}, 'sync both'));

      expect(result.files).toEqual([
        'addon.xml',
        path.join('resources', 'language', 'resource.language.en_gb', 'strings.po'),
      ]);
      expect(path.dirname(result.backupPath)).toBe(path.join(tempDir, '.metasync-backup'));
      expect(await fs.readFile(path.join(result.backupPath, 'addon.xml'), 'utf8')).toBe('<addon/>\n');

      const index = JSON.parse(await fs.readFile(path.join(result.backupPath, 'index.json'), 'utf8'));
      expect(index.version).toBe(1);
      expect(index.command).toBe('sync both');
      expect(index.files).toHaveLength(2);
    });

    it('returns null when there is nothing to back up', async () => {
      expect(await createBackup([], tempDir)).toBeNull();
    });

    it('uses a custom backup directory', async () => {
      const result = assertBackup(await createBackup([manifestPath], tempDir, { backupDir: 'backups' }));
      expect(path.dirname(result.backupPath)).toBe(path.join(tempDir, 'backups'));
    });

    it('keeps only the newest sets', async () => {
      vi.useFakeTimers({ toFake: ['Date'] });
      for (const second of [1, 2, 3]) {
        vi.setSystemTime(new Date(2024, 0, 15, 10, 30, second));
        await createBackup([manifestPath], tempDir, { maxBackups: 2 });
      }

      const backups = await listBackups(tempDir);
      expect(backups.map((backup) => backup.timestamp)).toEqual(['20240115-103003', '20240115-103002']);
    });
  });

  describe('listBackups', () => {
    it('returns an empty list without a backup directory', async () => {
      expect(await listBackups(tempDir)).toEqual([]);
    });

    it('ignores directories that are not backup sets', async () => {
      await createBackup([manifestPath], tempDir);
      await fs.mkdir(path.join(tempDir, '.metasync-backup', 'stray'), { recursive: true });

      const backups = await listBackups(tempDir);
      expect(backups).toHaveLength(1);
      expect(backups[0].fileCount).toBe(1);
    });
  });

  describe('restoreBackup', () => {
    it('puts the saved content back', async () => {
      const result = assertBackup(await createBackup([manifestPath, catalogPath], tempDir));
      await fs.writeFile(manifestPath, '<addon changed="true"/>\n');
      await fs.rm(catalogPath);

      const restored = await restoreBackup(result.backupPath, tempDir);

      expect(restored.restored).toHaveLength(2);
      expect(await fs.readFile(manifestPath, 'utf8')).toBe('<addon/>\n');
      expect(await fs.readFile(catalogPath, 'utf8')).toBe('msgid ""\nmsgstr ""\n');
      expect(restored.summary).toBe(`Restored 2 file(s) from backup ${result.timestamp}`);
    });
  });
});
