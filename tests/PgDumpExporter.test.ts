import { promises as fs } from 'fs';
import { join } from 'path';
import { PgDumpExporter } from '../src/clients/PgDumpExporter';
import { DumpError } from '../src/errors';
import { ConnectionParameters } from '../src/interfaces/BackupConfig';
import { FakeRunner, createMockLogger, makeTempDir, ok, removeDir } from './helpers';

describe('PgDumpExporter', () => {
  const connection: ConnectionParameters = {
    host: 'localhost',
    port: 5432,
    user: 'odoo',
    password: 'test-secret',
  };
  let tempDir: string;
  let outputFile: string;
  let runner: FakeRunner;
  let exporter: PgDumpExporter;

  beforeEach(async () => {
    tempDir = await makeTempDir();
    outputFile = join(tempDir, 'dump', 'shop.sql');
    runner = new FakeRunner();
    exporter = new PgDumpExporter(runner, createMockLogger());
  });

  afterEach(async () => {
    await removeDir(tempDir);
  });

  function dumpWrites(content: string): void {
    runner.on('pg_dump', async args => {
      await fs.writeFile(args[args.indexOf('-f') + 1], content);
      return ok();
    });
  }

  it('should run pg_dump with the password only in the environment', async () => {
    dumpWrites('CREATE TABLE res_partner ();\n');

    const info = await exporter.exportDatabase(connection, 'shop', outputFile);

    expect(runner.calls).toEqual([
      {
        command: 'pg_dump',
        args: ['-h', 'localhost', '-p', '5432', '-U', 'odoo', '-d', 'shop', '--no-password', '-f', outputFile],
        options: { env: { PGPASSWORD: 'test-secret' } },
      },
    ]);
    expect(runner.calls[0].args).not.toContain('test-secret');
    expect(info).toEqual({
      filePath: outputFile,
      fileSize: 'CREATE TABLE res_partner ();\n'.length,
      databaseName: 'shop',
      timestamp: expect.any(Date),
    });
  });

  it('should not set PGPASSWORD for an empty password', async () => {
    dumpWrites('-- empty\n');

    await exporter.exportDatabase({ ...connection, password: '' }, 'shop', outputFile);

    expect(runner.calls[0].options).toEqual({ env: {} });
  });

  it('should create the output directory', async () => {
    dumpWrites('-- dump\n');

    await exporter.exportDatabase(connection, 'shop', outputFile);

    await expect(fs.readFile(outputFile, 'utf8')).resolves.toBe('-- dump\n');
  });

  it('should report authentication failures', async () => {
    runner.on('pg_dump', () => ({
      exitCode: 1,
      stdout: '',
      stderr: 'pg_dump: error: FATAL:  password authentication failed for user "odoo"',
    }));

    const promise = exporter.exportDatabase(connection, 'shop', outputFile);

    await expect(promise).rejects.toBeInstanceOf(DumpError);
    await expect(promise).rejects.toThrow(
      'pg_dump authentication failed (exit code 1). Please check database credentials.'
    );
  });

  it('should report a missing database', async () => {
    runner.on('pg_dump', () => ({
      exitCode: 1,
      stdout: '',
      stderr: 'pg_dump: error: FATAL:  database "shop" does not exist',
    }));

    await expect(exporter.exportDatabase(connection, 'shop', outputFile)).rejects.toThrow(
      'pg_dump failed: database "shop" does not exist (exit code 1).'
    );
  });

  it('should include stderr for unknown failures', async () => {
    runner.on('pg_dump', () => ({ exitCode: 2, stdout: '', stderr: 'something odd\n' }));

    const error = await exporter.exportDatabase(connection, 'shop', outputFile).catch(e => e);

    expect(error).toBeInstanceOf(DumpError);
    expect(error.message).toBe('pg_dump failed with exit code 2. Error details: something odd');
    expect(error.exitCode).toBe(2);
  });

  it('should explain a missing pg_dump executable', async () => {
    await expect(exporter.exportDatabase(connection, 'shop', outputFile)).rejects.toThrow(
      'pg_dump not found. Please install PostgreSQL client tools.'
    );
  });

  it('should fail when pg_dump exits cleanly without writing the file', async () => {
    runner.on('pg_dump', () => ok());

    await expect(exporter.exportDatabase(connection, 'shop', outputFile)).rejects.toThrow(
      `Dump file was not created at ${outputFile}`
    );
  });
});
