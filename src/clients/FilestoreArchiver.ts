import { Dirent, promises as fs } from 'fs';
import path from 'path';
import { FilestoreArchiver as IFilestoreArchiver } from '../interfaces/BackupManager';
import { Logger } from '../interfaces/Logger';
import { ArchiveError, formatError, toError } from '../errors';
import { writeZip } from '../utils/ZipWriter';

/**
 * Regular files below `root`, sorted, following symlinks to files
 */
export async function listFiles(root: string): Promise<string[]> {
  const files: string[] = [];
  const entries: Dirent[] = await fs.readdir(root, { withFileTypes: true });
  entries.sort((a, b) => a.name.localeCompare(b.name));

  for (const entry of entries) {
    const fullPath = path.join(root, entry.name);
    if (entry.isDirectory()) {
      files.push(...(await listFiles(fullPath)));
    } else if (entry.isFile()) {
      files.push(fullPath);
    } else if (entry.isSymbolicLink()) {
      const target = await fs.stat(fullPath).catch(() => null);
      if (target?.isFile()) {
        files.push(fullPath);
      }
    }
  }

  return files;
}

/**
 * Zip entry name of `file`, relative to the parent of the archived directory
 */
export function entryName(sourceDir: string, file: string): string {
  return path.relative(path.dirname(sourceDir), file).split(path.sep).join('/');
}

/**
 * Writes a filestore directory into a deflate zip rooted at the directory's own name
 */
export class FilestoreArchiver implements IFilestoreArchiver {
  constructor(private readonly logger: Logger) {}

  /**
   * Archive every regular file below `sourceDir` into `targetFile`.
   * Files are streamed from disk, so the filestore size is not bounded by memory.
   * Resolves null, with a warning, when `sourceDir` is not a directory.
   */
  async archive(sourceDir: string, targetFile: string): Promise<string | null> {
    const source = path.resolve(sourceDir);

    const stats = await fs.stat(source).catch(() => null);
    if (!stats?.isDirectory()) {
      this.logger.warn(`Filestore path not found: ${sourceDir}`);
      return null;
    }

    try {
      const files = await listFiles(source);

      // Symlinked files are archived with the content they point at
      const entries = await Promise.all(
        files.map(async file => ({ source: await fs.realpath(file), name: entryName(source, file) }))
      );

      await fs.mkdir(path.dirname(targetFile), { recursive: true });
      await writeZip(targetFile, entries);

      this.logger.debug(`Filestore archived: ${files.length} files`, { sourceDir: source, targetFile });
      return targetFile;
    } catch (error) {
      throw new ArchiveError(`Failed to archive filestore ${source}: ${formatError(error)}`, toError(error));
    }
  }
}
