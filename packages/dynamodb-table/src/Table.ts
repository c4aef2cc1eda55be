import {
    TABLE_EXISTS_ERROR_CODE,
    TABLE_NOT_FOUND_ERROR_CODE,
} from './constants';
import { isServiceError } from './isServiceError';
import { Logger, noopLogger } from './Logger';
import { RequestOptions, TableConfiguration } from './namedParameters';
import { TableLifecycleClient } from './TableLifecycleClient';
import {
    createTableInput,
    TableOption,
    withHashKey,
} from '@tablekit/dynamodb-table-schema';
import { ScalarAttributeType } from '@aws-sdk/client-dynamodb';

/**
 * A handle on a single DynamoDB table that can create or delete it
 * idempotently.
 *
 * Each operation sends exactly one request and does not wait for the table to
 * reach a stable state. Errors other than the "already in the desired state"
 * error are rethrown as the client raised them.
 */
export class Table {
    readonly tableName: string;
    private readonly client: TableLifecycleClient;
    private readonly logger: Logger;

    constructor({
        client,
        tableName,
        tableNamePrefix = '',
        logger = noopLogger,
    }: TableConfiguration) {
        this.client = client;
        this.tableName = tableNamePrefix + tableName;
        this.logger = logger;
    }

    /**
     * Perform a CreateTable operation for this table, keyed by the supplied
     * hash key and configured by the supplied options. Resolves without error
     * if the table already exists.
     *
     * @param hashKeyName   The name of the table's partition key attribute.
     * @param hashKeyType   The scalar type of the partition key.
     * @param options       Further declarations; a hash key among them
     *                      replaces the one given positionally.
     * @param requestOptions    Options forwarded to the client call.
     */
    async createIfNotExists(
        hashKeyName: string,
        hashKeyType: ScalarAttributeType,
        options: Array<TableOption> = [],
        {abortSignal}: RequestOptions = {}
    ): Promise<void> {
        const input = createTableInput(
            this.tableName,
            [withHashKey(hashKeyName, hashKeyType), ...options]
        );

        try {
            await this.client.createTable(input, {abortSignal});
        } catch (err) {
            if (isServiceError(err, TABLE_EXISTS_ERROR_CODE)) {
                this.logger.debug(`Table ${this.tableName} already exists`);
                return;
            }

            throw err;
        }

        this.logger.info(`Created table ${this.tableName}`);
    }

    /**
     * Perform a DeleteTable operation for this table. Resolves without error
     * if the table does not exist.
     */
    async deleteIfExists({abortSignal}: RequestOptions = {}): Promise<void> {
        try {
            await this.client.deleteTable(
                {TableName: this.tableName},
                {abortSignal}
            );
        } catch (err) {
            if (isServiceError(err, TABLE_NOT_FOUND_ERROR_CODE)) {
                this.logger.debug(`Table ${this.tableName} does not exist`);
                return;
            }

            throw err;
        }

        this.logger.info(`Deleted table ${this.tableName}`);
    }
}
