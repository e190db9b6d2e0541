import { FilestoreStrategy, LocatorContext } from '../../interfaces/FilestoreLocator';
import { formatError } from '../../errors';
import { pathExists } from '../DirectoryProbe';
import { DEFAULT_SEARCH_PATHS, PathTemplates, expandTemplates, filestoreUnder, pathApi } from '../SearchPaths';

/**
 * Path of a stored file below the filestore root.
 * Odoo references already carry their `ab/` bucket; bare hashes get one derived from their first two characters.
 */
export function attachmentRelativePath(reference: string): string[] {
  const parts = reference.split('/').filter(part => part !== '');
  if (parts.length > 1) {
    return parts;
  }
  return [reference.slice(0, 2), reference];
}

/**
 * Finds the filestore holding a file that `ir_attachment` points at
 */
export class AttachmentReferenceStrategy implements FilestoreStrategy {
  readonly name = 'attachment-reference';

  constructor(private readonly bases: PathTemplates = DEFAULT_SEARCH_PATHS.attachmentBases) {}

  async locate(context: LocatorContext): Promise<string | null> {
    const { database, connection, host, logger } = context;

    let reference: string | null;
    try {
      reference = await context.postgresClient.findAttachmentReference(connection, database);
    } catch (error) {
      logger.debug(`Could not read attachments of '${database}'`, { error: formatError(error) });
      return null;
    }

    if (!reference) {
      return null;
    }

    const relative = attachmentRelativePath(reference);
    const api = pathApi(host);

    for (const base of expandTemplates(this.bases, host, database)) {
      const filestore = filestoreUnder(base, host, database);
      if (!(await pathExists(api.join(filestore, ...relative)))) {
        continue;
      }
      if (await context.isAccepted(filestore)) {
        return filestore;
      }
    }

    return null;
  }
}
