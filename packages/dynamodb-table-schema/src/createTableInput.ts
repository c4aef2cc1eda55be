import {
    AttributeDefinition,
    BillingMode,
    CreateTableCommandInput,
    GlobalSecondaryIndex,
    KeySchemaElement,
    LocalSecondaryIndex,
    Projection,
    ProvisionedThroughput,
} from '@aws-sdk/client-dynamodb';
import { buildTableOptions } from './buildOptions';
import { InvalidSchemaError } from './InvalidSchemaError';
import { mergeAttributeDefinitions } from './mergeAttributeDefinitions';
import {
    AttributeDeclaration,
    CapacityOptions,
    IndexDeclaration,
    KeyOptions,
    TableOption,
} from './TableOption';

/**
 * Render a CreateTable request for the named table from the supplied
 * options.
 *
 * Options are folded first. Index declarations are then resolved against the
 * table's final billing mode, so a global index only carries provisioned
 * throughput when the table does.
 */
export function createTableInput(
    tableName: string,
    options: Iterable<TableOption>
): CreateTableCommandInput {
    const {
        billingMode,
        globalIndexes,
        localIndexes,
        streamViewType,
        sseSpecification,
        ...tableOptions
    } = buildTableOptions(options);

    assertUniqueIndexNames([...globalIndexes, ...localIndexes]);

    let AttributeDefinitions = mergeAttributeDefinitions(
        [],
        ...keyAttributes(tableOptions)
    );

    const GlobalSecondaryIndexes: Array<GlobalSecondaryIndex> = [];
    for (const declaration of globalIndexes) {
        GlobalSecondaryIndexes.push({
            ...indexDefinition(declaration),
            ...provisionedThroughput(billingMode, declaration.options),
        });
        AttributeDefinitions = mergeIndexAttributes(
            AttributeDefinitions,
            declaration
        );
    }

    const LocalSecondaryIndexes: Array<LocalSecondaryIndex> = [];
    for (const declaration of localIndexes) {
        LocalSecondaryIndexes.push(indexDefinition(declaration));
        AttributeDefinitions = mergeIndexAttributes(
            AttributeDefinitions,
            declaration
        );
    }

    const input: CreateTableCommandInput = {
        TableName: tableName,
        AttributeDefinitions,
        KeySchema: keySchema(tableOptions),
        BillingMode: billingMode,
        ...provisionedThroughput(billingMode, tableOptions),
    };
    if (GlobalSecondaryIndexes.length > 0) {
        input.GlobalSecondaryIndexes = GlobalSecondaryIndexes;
    }
    if (LocalSecondaryIndexes.length > 0) {
        input.LocalSecondaryIndexes = LocalSecondaryIndexes;
    }
    if (streamViewType) {
        input.StreamSpecification = {
            StreamEnabled: true,
            StreamViewType: streamViewType,
        };
    }
    if (sseSpecification) {
        const {sseType, kmsMasterKeyId} = sseSpecification;
        input.SSESpecification = kmsMasterKeyId === undefined
            ? {Enabled: true, SSEType: sseType}
            : {Enabled: true, SSEType: sseType, KMSMasterKeyId: kmsMasterKeyId};
    }

    return input;
}

function assertUniqueIndexNames(declarations: Array<IndexDeclaration>): void {
    const names = new Set<string>();
    for (const {indexName} of declarations) {
        if (names.has(indexName)) {
            throw new InvalidSchemaError(
                indexName,
                `The ${indexName} index is declared more than once`
            );
        }
        names.add(indexName);
    }
}

function indexDefinition({
    indexName,
    projectionType,
    options,
}: IndexDeclaration): {
    IndexName: string;
    KeySchema: Array<KeySchemaElement>;
    Projection: Projection;
} {
    const Projection: Projection = {ProjectionType: projectionType};
    if (options.attributes.length > 0) {
        Projection.NonKeyAttributes = options.attributes.map(({name}) => name);
    }

    return {
        IndexName: indexName,
        KeySchema: keySchema(options),
        Projection,
    };
}

function keyAttributes({hashKey, rangeKey}: KeyOptions): Array<AttributeDeclaration> {
    const attributes: Array<AttributeDeclaration> = [];
    if (hashKey) {
        attributes.push(hashKey);
    }
    if (rangeKey) {
        attributes.push(rangeKey);
    }

    return attributes;
}

function keySchema({hashKey, rangeKey}: KeyOptions): Array<KeySchemaElement> {
    const elementList: Array<KeySchemaElement> = [];
    if (hashKey) {
        elementList.push({AttributeName: hashKey.name, KeyType: 'HASH'});
    }
    if (rangeKey) {
        elementList.push({AttributeName: rangeKey.name, KeyType: 'RANGE'});
    }

    return elementList;
}

function mergeIndexAttributes(
    definitions: Array<AttributeDefinition>,
    {options}: IndexDeclaration
): Array<AttributeDefinition> {
    return mergeAttributeDefinitions(
        definitions,
        ...keyAttributes(options),
        ...options.attributes
    );
}

function provisionedThroughput(
    billingMode: BillingMode,
    {readCapacityUnits, writeCapacityUnits}: CapacityOptions
): {
    ProvisionedThroughput?: ProvisionedThroughput
} {
    if (billingMode === 'PAY_PER_REQUEST') {
        return {};
    }

    return {
        ProvisionedThroughput: {
            ReadCapacityUnits: readCapacityUnits,
            WriteCapacityUnits: writeCapacityUnits,
        },
    };
}
