import {
    BillingMode,
    ProjectionType,
    ScalarAttributeType,
    SSEType,
    StreamViewType,
} from '@aws-sdk/client-dynamodb';

export interface AttributeDeclaration {
    name: string;
    type: ScalarAttributeType;
}

export interface AttributeOption {
    kind: 'attribute';
    attribute: AttributeDeclaration;
}

export interface HashKeyOption {
    kind: 'hashKey';
    attribute: AttributeDeclaration;
}

export interface RangeKeyOption {
    kind: 'rangeKey';
    attribute: AttributeDeclaration;
}

export interface ReadCapacityOption {
    kind: 'readCapacity';
    units: number;
}

export interface WriteCapacityOption {
    kind: 'writeCapacity';
    units: number;
}

export interface BillingModeOption {
    kind: 'billingMode';
    billingMode: BillingMode;
}

export interface StreamSpecificationOption {
    kind: 'streamSpecification';
    streamViewType: StreamViewType;
}

export interface SseSpecification {
    sseType: SSEType;
    kmsMasterKeyId?: string;
}

export interface SseSpecificationOption {
    kind: 'sseSpecification';
    sseSpecification: SseSpecification;
}

export type SecondaryIndexType = 'global' | 'local';

/**
 * A secondary index as it was declared. Its options are folded, but its
 * throughput is only settled once the table's billing mode is known.
 */
export interface IndexDeclaration {
    type: SecondaryIndexType;
    indexName: string;
    projectionType: ProjectionType;
    options: IndexOptions;
}

export interface GlobalSecondaryIndexOption {
    kind: 'globalSecondaryIndex';
    declaration: IndexDeclaration;
}

export interface LocalSecondaryIndexOption {
    kind: 'localSecondaryIndex';
    declaration: IndexDeclaration;
}

/**
 * Options understood by both a table and each of its secondary indexes.
 */
export type SharedOption =
    HashKeyOption |
    RangeKeyOption |
    ReadCapacityOption |
    WriteCapacityOption;

export type IndexOption = SharedOption | AttributeOption;

export type TableOption =
    SharedOption |
    BillingModeOption |
    StreamSpecificationOption |
    SseSpecificationOption |
    GlobalSecondaryIndexOption |
    LocalSecondaryIndexOption;

export interface KeyOptions {
    hashKey?: AttributeDeclaration;
    rangeKey?: AttributeDeclaration;
}

export interface CapacityOptions {
    readCapacityUnits: number;
    writeCapacityUnits: number;
}

export interface IndexOptions extends KeyOptions, CapacityOptions {
    /**
     * Non-key attributes projected into the index, in declaration order.
     */
    attributes: Array<AttributeDeclaration>;
}

export interface TableOptions extends KeyOptions, CapacityOptions {
    billingMode: BillingMode;
    globalIndexes: Array<IndexDeclaration>;
    localIndexes: Array<IndexDeclaration>;
    streamViewType?: StreamViewType;
    sseSpecification?: SseSpecification;
}
