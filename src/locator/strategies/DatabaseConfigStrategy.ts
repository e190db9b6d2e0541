import { FilestoreStrategy, LocatorContext } from '../../interfaces/FilestoreLocator';
import { formatError } from '../../errors';
import { filestoreUnder } from '../SearchPaths';

export const FILESTORE_PATH_KEY = 'database.filestore_path';
export const DATA_DIR_KEY = 'database.data_dir';
export const ATTACHMENT_LOCATION_KEY = 'ir_attachment.location';

/** Highest priority first */
export const CONFIG_PARAMETER_KEYS = [FILESTORE_PATH_KEY, DATA_DIR_KEY, ATTACHMENT_LOCATION_KEY] as const;

/**
 * Reads the filestore location from the database's own `ir_config_parameter` table
 */
export class DatabaseConfigStrategy implements FilestoreStrategy {
  readonly name = 'database-config';

  async locate(context: LocatorContext): Promise<string | null> {
    const { database, connection, host, logger } = context;

    let parameters: Map<string, string>;
    try {
      parameters = await context.postgresClient.readConfigParameters(connection, database, CONFIG_PARAMETER_KEYS);
    } catch (error) {
      logger.debug(`Could not read configuration parameters of '${database}'`, { error: formatError(error) });
      return null;
    }

    const filestorePath = parameters.get(FILESTORE_PATH_KEY);
    if (filestorePath && (await context.isAccepted(filestorePath))) {
      return filestorePath;
    }

    const dataDir = parameters.get(DATA_DIR_KEY);
    if (dataDir) {
      const candidate = filestoreUnder(dataDir, host, database);
      if (await context.isAccepted(candidate)) {
        return candidate;
      }
    }

    const location = parameters.get(ATTACHMENT_LOCATION_KEY);
    if (location?.startsWith('file')) {
      logger.debug(`Attachments of '${database}' are stored on disk (${location})`);
    }

    return null;
  }
}
