import { FilestoreStrategy, LocatorContext } from '../../interfaces/FilestoreLocator';
import { DEFAULT_SEARCH_PATHS, PathTemplates, expandTemplates } from '../SearchPaths';

/**
 * Sweeps the usual install locations
 */
export class ConventionalPathStrategy implements FilestoreStrategy {
  readonly name = 'conventional-path';

  constructor(private readonly filestoreDirs: PathTemplates = DEFAULT_SEARCH_PATHS.filestoreDirs) {}

  async locate(context: LocatorContext): Promise<string | null> {
    for (const candidate of expandTemplates(this.filestoreDirs, context.host, context.database)) {
      if (await context.isAccepted(candidate)) {
        return candidate;
      }
    }
    return null;
  }
}
