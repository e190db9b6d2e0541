import { promises as fs } from 'fs';

/**
 * A filestore candidate is accepted when it is an existing directory with at least one entry.
 * Any error while probing rejects the candidate.
 */
export async function isAcceptedFilestore(candidate: string): Promise<boolean> {
  try {
    const stats = await fs.stat(candidate);
    if (!stats.isDirectory()) {
      return false;
    }
    const entries = await fs.readdir(candidate);
    return entries.length > 0;
  } catch {
    return false;
  }
}

export async function isDirectory(candidate: string): Promise<boolean> {
  try {
    return (await fs.stat(candidate)).isDirectory();
  } catch {
    return false;
  }
}

export async function pathExists(candidate: string): Promise<boolean> {
  try {
    await fs.access(candidate);
    return true;
  } catch {
    return false;
  }
}
