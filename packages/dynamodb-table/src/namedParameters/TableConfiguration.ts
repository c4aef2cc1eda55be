import { Logger } from '../Logger';
import { TableLifecycleClient } from '../TableLifecycleClient';

export interface TableConfiguration {
    /**
     * The low-level DynamoDB client to use to execute API operations.
     */
    client: TableLifecycleClient;

    /**
     * The name of the table, before any prefix is applied.
     */
    tableName: string;

    /**
     * A prefix to apply to the table name.
     */
    tableNamePrefix?: string;

    /**
     * Receives a line for each table created or deleted. If not specified,
     * nothing is logged.
     */
    logger?: Logger;
}
