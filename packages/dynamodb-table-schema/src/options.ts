import {
    BillingMode,
    ProjectionType,
    ScalarAttributeType,
    StreamViewType,
} from '@aws-sdk/client-dynamodb';
import { buildIndexOptions } from './buildOptions';
import { InvalidSchemaError } from './InvalidSchemaError';
import {
    AttributeOption,
    BillingModeOption,
    GlobalSecondaryIndexOption,
    HashKeyOption,
    IndexOption,
    LocalSecondaryIndexOption,
    RangeKeyOption,
    ReadCapacityOption,
    SseSpecification,
    SseSpecificationOption,
    StreamSpecificationOption,
    WriteCapacityOption,
} from './TableOption';

/**
 * Declare a non-key attribute projected into a secondary index. The
 * attribute is listed among the index's `NonKeyAttributes` and added to the
 * table's attribute definitions.
 */
export function withAttribute(
    name: string,
    type: ScalarAttributeType
): AttributeOption {
    return {kind: 'attribute', attribute: {name, type}};
}

export function withHashKey(
    name: string,
    type: ScalarAttributeType
): HashKeyOption {
    return {kind: 'hashKey', attribute: {name, type}};
}

export function withRangeKey(
    name: string,
    type: ScalarAttributeType
): RangeKeyOption {
    return {kind: 'rangeKey', attribute: {name, type}};
}

export function withReadCapacity(units: number): ReadCapacityOption {
    return {kind: 'readCapacity', units: capacityUnits(units)};
}

export function withWriteCapacity(units: number): WriteCapacityOption {
    return {kind: 'writeCapacity', units: capacityUnits(units)};
}

export function withBillingMode(billingMode: BillingMode): BillingModeOption {
    return {kind: 'billingMode', billingMode};
}

/**
 * Enable a DynamoDB stream on the table with the supplied view type.
 */
export function withStreamSpecification(
    streamViewType: StreamViewType
): StreamSpecificationOption {
    return {kind: 'streamSpecification', streamViewType};
}

export function withSseSpecification(
    sseSpecification: SseSpecification
): SseSpecificationOption {
    return {kind: 'sseSpecification', sseSpecification};
}

/**
 * Declare a global secondary index. The index options are folded now; the
 * index's provisioned throughput is decided when the table is rendered, so
 * that it follows the billing mode the table ends up with.
 *
 * @param indexName         The name of the index.
 * @param projectionType    Which attributes are copied into the index.
 * @param options           Keys, projected attributes and capacity of the
 *                          index.
 */
export function withGlobalSecondaryIndex(
    indexName: string,
    projectionType: ProjectionType,
    ...options: Array<IndexOption>
): GlobalSecondaryIndexOption {
    return {
        kind: 'globalSecondaryIndex',
        declaration: {
            type: 'global',
            indexName,
            projectionType,
            options: buildIndexOptions(options),
        },
    };
}

/**
 * Declare a local secondary index. Local indexes share the table's
 * throughput, so any capacity options supplied here are ignored on render.
 */
export function withLocalSecondaryIndex(
    indexName: string,
    projectionType: ProjectionType,
    ...options: Array<IndexOption>
): LocalSecondaryIndexOption {
    return {
        kind: 'localSecondaryIndex',
        declaration: {
            type: 'local',
            indexName,
            projectionType,
            options: buildIndexOptions(options),
        },
    };
}

function capacityUnits(units: number): number {
    if (!Number.isInteger(units) || units < 1) {
        throw new InvalidSchemaError(
            units,
            `Capacity units must be a positive integer, received ${units}`
        );
    }

    return units;
}
