import {
    CreateTableCommandInput,
    CreateTableCommandOutput,
    DeleteTableCommandInput,
    DeleteTableCommandOutput,
} from '@aws-sdk/client-dynamodb';
import { RequestOptions } from './namedParameters';

/**
 * The DynamoDB operations a {Table} needs. The aggregated `DynamoDB` client
 * from `@aws-sdk/client-dynamodb` satisfies this interface.
 */
export interface TableLifecycleClient {
    createTable(
        input: CreateTableCommandInput,
        options?: RequestOptions
    ): Promise<CreateTableCommandOutput>;

    deleteTable(
        input: DeleteTableCommandInput,
        options?: RequestOptions
    ): Promise<DeleteTableCommandOutput>;
}
