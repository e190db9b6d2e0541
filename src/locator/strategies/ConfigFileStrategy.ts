import { promises as fs } from 'fs';
import { FilestoreStrategy, HostEnvironment, LocatorContext } from '../../interfaces/FilestoreLocator';
import { isDirectory } from '../DirectoryProbe';
import { DEFAULT_SEARCH_PATHS, PathTemplates, expandTemplates, filestoreUnder, pathApi } from '../SearchPaths';

const DATA_DIR_LINE = /^data_dir\s*[=:]\s*(.*)$/;

/**
 * First `data_dir` assignment of an Odoo configuration file
 */
export function parseDataDir(content: string): string | null {
  for (const rawLine of content.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (line.startsWith('#') || line.startsWith(';')) {
      continue;
    }
    const match = DATA_DIR_LINE.exec(line);
    if (match) {
      const value = match[1].trim();
      if (value !== '') {
        return value;
      }
    }
  }
  return null;
}

export function expandHome(value: string, host: HostEnvironment): string {
  if (value === '~') {
    return host.homeDir;
  }
  if (value.startsWith('~/') || value.startsWith('~\\')) {
    return pathApi(host).join(host.homeDir, value.slice(2));
  }
  return value;
}

/**
 * Follows `data_dir` from the Odoo server configuration files
 */
export class ConfigFileStrategy implements FilestoreStrategy {
  readonly name = 'config-file';

  constructor(private readonly configFiles: PathTemplates = DEFAULT_SEARCH_PATHS.configFiles) {}

  async locate(context: LocatorContext): Promise<string | null> {
    const { database, host, logger } = context;

    for (const configFile of expandTemplates(this.configFiles, host, database)) {
      let content: string;
      try {
        content = await fs.readFile(configFile, 'utf8');
      } catch {
        continue;
      }

      const dataDir = parseDataDir(content);
      if (dataDir === null) {
        continue;
      }

      const resolvedDataDir = expandHome(dataDir, host);
      if (!(await isDirectory(resolvedDataDir))) {
        logger.debug(`data_dir from ${configFile} does not exist: ${resolvedDataDir}`);
        continue;
      }

      const candidate = filestoreUnder(resolvedDataDir, host, database);
      if (await context.isAccepted(candidate)) {
        return candidate;
      }
    }

    return null;
  }
}
