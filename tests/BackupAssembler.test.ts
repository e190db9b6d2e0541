import AdmZip from 'adm-zip';
import { promises as fs } from 'fs';
import { join } from 'path';
import { BackupAssembler, backupFileName, formatTimestamp } from '../src/clients/BackupAssembler';
import { ArchiveError } from '../src/errors';
import { createMockLogger, makeTempDir, removeDir, writeTree } from './helpers';

describe('BackupAssembler', () => {
  let root: string;
  let assembler: BackupAssembler;

  beforeEach(async () => {
    root = await makeTempDir('odoo-assembler-');
    assembler = new BackupAssembler(createMockLogger());
    await writeTree(root, {
      'tmp/shop.sql': 'CREATE TABLE res_partner ();\n',
      'tmp/filestore.zip': 'inner archive bytes',
    });
  });

  afterEach(async () => {
    await removeDir(root);
  });

  it('should format local timestamps as YYYYMMDD_HHMMSS', () => {
    expect(formatTimestamp(new Date(2024, 0, 5, 4, 3, 9))).toBe('20240105_040309');
    expect(backupFileName('shop', new Date(2024, 10, 25, 23, 59, 1))).toBe('shop_20241125_235901.zip');
  });

  it('should bundle the dump and the filestore archive', async () => {
    const now = new Date(2024, 0, 15, 14, 30, 45);

    const artifact = await assembler.assemble({
      dumpFile: join(root, 'tmp/shop.sql'),
      filestoreArchive: join(root, 'tmp/filestore.zip'),
      outputDirectory: join(root, 'backups'),
      databaseName: 'shop',
      now,
    });

    const stats = await fs.stat(artifact.filePath);
    expect(artifact).toEqual({
      databaseName: 'shop',
      filePath: join(root, 'backups', 'shop_20240115_143045.zip'),
      fileName: 'shop_20240115_143045.zip',
      outputDirectory: join(root, 'backups'),
      createdAt: now,
      fileSize: stats.size,
      includesFilestore: true,
    });

    const zip = new AdmZip(artifact.filePath);
    expect(
      zip
        .getEntries()
        .map(entry => entry.entryName)
        .sort()
    ).toEqual(['filestore.zip', 'shop.sql']);
    expect(zip.readAsText('shop.sql')).toBe('CREATE TABLE res_partner ();\n');
    expect(zip.readAsText('filestore.zip')).toBe('inner archive bytes');
  });

  it('should contain only the dump when there is no filestore archive', async () => {
    const artifact = await assembler.assemble({
      dumpFile: join(root, 'tmp/shop.sql'),
      filestoreArchive: null,
      outputDirectory: join(root, 'backups'),
      databaseName: 'shop',
    });

    expect(artifact.fileName).toMatch(/^shop_\d{8}_\d{6}\.zip$/);
    expect(artifact.includesFilestore).toBe(false);
    expect(new AdmZip(artifact.filePath).getEntries().map(entry => entry.entryName)).toEqual(['shop.sql']);
  });

  it('should ignore a filestore archive that was never written', async () => {
    const artifact = await assembler.assemble({
      dumpFile: join(root, 'tmp/shop.sql'),
      filestoreArchive: join(root, 'tmp/missing.zip'),
      outputDirectory: join(root, 'backups'),
      databaseName: 'shop',
    });

    expect(artifact.includesFilestore).toBe(false);
    expect(new AdmZip(artifact.filePath).getEntries().map(entry => entry.entryName)).toEqual(['shop.sql']);
  });

  it('should create nested output directories', async () => {
    const artifact = await assembler.assemble({
      dumpFile: join(root, 'tmp/shop.sql'),
      filestoreArchive: null,
      outputDirectory: join(root, 'a', 'b', 'c'),
      databaseName: 'shop',
    });

    expect(artifact.outputDirectory).toBe(join(root, 'a', 'b', 'c'));
    await expect(fs.stat(artifact.filePath)).resolves.toBeDefined();
  });

  it('should raise an ArchiveError when the dump is missing', async () => {
    await expect(
      assembler.assemble({
        dumpFile: join(root, 'tmp/none.sql'),
        filestoreArchive: null,
        outputDirectory: join(root, 'backups'),
        databaseName: 'shop',
      })
    ).rejects.toBeInstanceOf(ArchiveError);
  });

  it('should stream dumps larger than 2 GiB', async () => {
    const size = 2 * 1024 ** 3 + 10;
    const dumpFile = join(root, 'tmp', 'large.sql');
    await fs.writeFile(dumpFile, '');
    await fs.truncate(dumpFile, size);

    const artifact = await assembler.assemble({
      dumpFile,
      filestoreArchive: null,
      outputDirectory: join(root, 'backups'),
      databaseName: 'shop',
    });

    const entries = new AdmZip(artifact.filePath).getEntries();
    expect(entries.map(entry => entry.entryName)).toEqual(['shop.sql']);
    expect(entries[0].header.size).toBe(size);
    expect(artifact.fileSize).toBeLessThan(size);
  }, 300_000);
});
