import { Client, ClientConfig } from 'pg';
import { ConnectionParameters } from '../interfaces/BackupConfig';
import { PostgreSQLClient as IPostgreSQLClient } from '../interfaces/PostgreSQLClient';
import { Logger } from '../interfaces/Logger';
import { ConnectionError, formatError, toError } from '../errors';

export const ADMIN_DATABASE = 'postgres';

/**
 * PostgreSQL access for the database catalog and Odoo's own tables
 */
export class PostgreSQLClient implements IPostgreSQLClient {
  constructor(private readonly logger: Logger) {}

  /**
   * List the non-template databases of the server, connecting through the administrative database
   */
  async listDatabases(connection: ConnectionParameters): Promise<string[]> {
    try {
      const result = await this.withClient(connection, ADMIN_DATABASE, client =>
        client.query<{ datname: string }>(
          'SELECT datname FROM pg_database WHERE datistemplate = false ORDER BY datname'
        )
      );
      return result.rows.map(row => row.datname);
    } catch (error) {
      throw new ConnectionError(
        `Error connecting to PostgreSQL at ${connection.host}:${connection.port}: ${formatError(error)}`,
        toError(error)
      );
    }
  }

  /**
   * Read the requested `ir_config_parameter` keys of one Odoo database.
   * Keys that are missing or blank are left out of the map.
   */
  async readConfigParameters(
    connection: ConnectionParameters,
    database: string,
    keys: readonly string[]
  ): Promise<Map<string, string>> {
    const result = await this.withClient(connection, database, client =>
      client.query<{ key: string; value: string | null }>(
        'SELECT key, value FROM ir_config_parameter WHERE key = ANY($1::text[])',
        [[...keys]]
      )
    );

    // Values are trimmed; blank ones count as unset
    const parameters = new Map<string, string>();
    for (const row of result.rows) {
      if (row.value !== null && row.value.trim() !== '') {
        parameters.set(row.key, row.value.trim());
      }
    }
    return parameters;
  }

  /**
   * Fetch one stored file reference (`store_fname`) from `ir_attachment`
   */
  async findAttachmentReference(
    connection: ConnectionParameters,
    database: string
  ): Promise<string | null> {
    const result = await this.withClient(connection, database, client =>
      client.query<{ store_fname: string }>(
        "SELECT store_fname FROM ir_attachment WHERE store_fname IS NOT NULL AND store_fname <> '' LIMIT 1"
      )
    );
    return result.rows.length > 0 ? result.rows[0].store_fname : null;
  }

  /**
   * Open a connection to one database, run `work`, and always close it
   */
  private async withClient<T>(
    connection: ConnectionParameters,
    database: string,
    work: (client: Client) => Promise<T>
  ): Promise<T> {
    const client = new Client(this.clientConfig(connection, database));

    try {
      await client.connect();
      return await work(client);
    } finally {
      await client.end().catch(cleanupError => {
        this.logger.debug('Failed to close database connection during cleanup', {
          error: formatError(cleanupError),
        });
      });
    }
  }

  private clientConfig(connection: ConnectionParameters, database: string): ClientConfig {
    return {
      host: connection.host,
      port: connection.port,
      user: connection.user,
      password: connection.password,
      database,
    };
  }
}
