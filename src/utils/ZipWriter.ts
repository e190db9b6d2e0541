import archiver from 'archiver';
import { createWriteStream } from 'fs';

export interface ZipEntry {
  /** File on disk, streamed into the archive */
  source: string;
  /** Entry name inside the archive, POSIX separators */
  name: string;
}

/**
 * Stream files from disk into a deflate zip at `targetFile`, in the given order.
 * Resolves once the archive is flushed and closed.
 */
export function writeZip(targetFile: string, entries: readonly ZipEntry[]): Promise<void> {
  return new Promise((resolve, reject) => {
    const output = createWriteStream(targetFile);
    const archive = archiver('zip', { zlib: { level: 6 } });

    const fail = (error: Error): void => {
      archive.abort();
      reject(error);
    };

    output.on('close', () => resolve());
    output.on('error', fail);
    // Missing or unreadable sources surface as warnings
    archive.on('warning', fail);
    archive.on('error', fail);

    archive.pipe(output);
    for (const entry of entries) {
      archive.file(entry.source, { name: entry.name });
    }
    archive.finalize().catch(fail);
  });
}
