import { parseDatabaseConfig, type DatabaseConfigInput } from '../config/database-config.js';
import {
  postgresPlaceholder,
  sqlitePlaceholder,
  type PlaceholderFormatter,
} from '../core/params/named-parameters.js';
import type { Logger } from '../logging/logger.js';
import type { Connector } from './connector.js';
import { PostgresConnector } from './postgres-connector.js';
import { SqliteConnector } from './sqlite-connector.js';

export interface ConfiguredConnector {
  connector: Connector;
  /** Marker style the provider binds positional parameters with */
  placeholder: PlaceholderFormatter;
}

/**
 * Validates `input` and builds the connector its provider names.
 */
export async function createConnector(
  input: DatabaseConfigInput,
  options: { logger?: Logger } = {}
): Promise<ConfiguredConnector> {
  const config = parseDatabaseConfig(input);

  switch (config.provider) {
    case 'postgres':
      return {
        connector: new PostgresConnector(config, options),
        placeholder: postgresPlaceholder,
      };
    case 'sqlite':
      return {
        connector: await SqliteConnector.fromConfig(config, options),
        placeholder: sqlitePlaceholder,
      };
  }
}
