import path from 'path';
import { HostEnvironment } from '../interfaces/FilestoreLocator';
import defaultSearchPaths from './search-paths.json';

export type PathFamily = 'posix' | 'win32';

export type PathTemplates = Record<PathFamily, string[]>;

/**
 * Ordered path templates for each search that walks the filesystem
 */
export interface SearchPaths {
  configFiles: PathTemplates;
  attachmentBases: PathTemplates;
  filestoreDirs: PathTemplates;
}

export const DEFAULT_SEARCH_PATHS: SearchPaths = defaultSearchPaths;

const PLACEHOLDER = /\{(\w+)\}/g;

export function pathFamily(host: HostEnvironment): PathFamily {
  return host.platform === 'win32' ? 'win32' : 'posix';
}

/**
 * Path functions matching the host's separator conventions
 */
export function pathApi(host: HostEnvironment): path.PlatformPath {
  return host.platform === 'win32' ? path.win32 : path.posix;
}

export function templateVariables(host: HostEnvironment, database: string): Record<string, string | undefined> {
  return {
    database,
    home: host.homeDir || undefined,
    xdgDataHome: host.env.XDG_DATA_HOME,
    appData: host.env.APPDATA,
    localAppData: host.env.LOCALAPPDATA,
    programFiles: host.env.ProgramFiles ?? host.env.PROGRAMFILES,
    programFilesX86: host.env['ProgramFiles(x86)'],
  };
}

/**
 * Fill `{name}` placeholders; null when a placeholder has no value on this host
 */
export function expandTemplate(template: string, variables: Record<string, string | undefined>): string | null {
  let missing = false;
  const expanded = template.replace(PLACEHOLDER, (match, name: string) => {
    const value = variables[name];
    if (value === undefined || value === '') {
      missing = true;
      return match;
    }
    return value;
  });
  return missing ? null : expanded;
}

/**
 * Expand the templates for this host's path family, in order, without duplicates
 */
export function expandTemplates(templates: PathTemplates, host: HostEnvironment, database: string): string[] {
  const variables = templateVariables(host, database);
  const api = pathApi(host);
  const seen = new Set<string>();
  const paths: string[] = [];

  for (const template of templates[pathFamily(host)]) {
    const expanded = expandTemplate(template, variables);
    if (expanded === null) {
      continue;
    }
    const normalized = api.normalize(expanded);
    if (!seen.has(normalized)) {
      seen.add(normalized);
      paths.push(normalized);
    }
  }

  return paths;
}

/**
 * `<root>/filestore/<database>` in the host's path style
 */
export function filestoreUnder(root: string, host: HostEnvironment, database: string): string {
  return pathApi(host).join(root, 'filestore', database);
}
