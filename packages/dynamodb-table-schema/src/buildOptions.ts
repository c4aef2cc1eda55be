import {
    DEFAULT_BILLING_MODE,
    DEFAULT_READ_CAPACITY,
    DEFAULT_WRITE_CAPACITY,
} from './constants';
import {
    CapacityOptions,
    IndexOption,
    IndexOptions,
    KeyOptions,
    SharedOption,
    TableOption,
    TableOptions,
} from './TableOption';

/**
 * Fold table options, in the order supplied, onto the default table
 * configuration. Later options replace earlier ones for single-valued
 * settings; index declarations accumulate.
 */
export function buildTableOptions(options: Iterable<TableOption>): TableOptions {
    const tableOptions: TableOptions = {
        ...defaultCapacity(),
        billingMode: DEFAULT_BILLING_MODE,
        globalIndexes: [],
        localIndexes: [],
    };

    for (const option of options) {
        switch (option.kind) {
            case 'billingMode':
                tableOptions.billingMode = option.billingMode;
                break;
            case 'streamSpecification':
                tableOptions.streamViewType = option.streamViewType;
                break;
            case 'sseSpecification':
                tableOptions.sseSpecification = option.sseSpecification;
                break;
            case 'globalSecondaryIndex':
                tableOptions.globalIndexes.push(option.declaration);
                break;
            case 'localSecondaryIndex':
                tableOptions.localIndexes.push(option.declaration);
                break;
            default:
                applySharedOption(tableOptions, option);
        }
    }

    return tableOptions;
}

/**
 * Fold index options, in the order supplied, onto the default index
 * configuration. Projected attributes accumulate.
 */
export function buildIndexOptions(options: Iterable<IndexOption>): IndexOptions {
    const indexOptions: IndexOptions = {
        ...defaultCapacity(),
        attributes: [],
    };

    for (const option of options) {
        if (option.kind === 'attribute') {
            indexOptions.attributes.push(option.attribute);
        } else {
            applySharedOption(indexOptions, option);
        }
    }

    return indexOptions;
}

function applySharedOption(
    target: KeyOptions & CapacityOptions,
    option: SharedOption
): void {
    switch (option.kind) {
        case 'hashKey':
            target.hashKey = option.attribute;
            break;
        case 'rangeKey':
            target.rangeKey = option.attribute;
            break;
        case 'readCapacity':
            target.readCapacityUnits = option.units;
            break;
        case 'writeCapacity':
            target.writeCapacityUnits = option.units;
            break;
        default:
            throw new Error(
                `Unrecognized option: ${JSON.stringify(unreachable(option))}`
            );
    }
}

function defaultCapacity(): CapacityOptions {
    return {
        readCapacityUnits: DEFAULT_READ_CAPACITY,
        writeCapacityUnits: DEFAULT_WRITE_CAPACITY,
    };
}

function unreachable(option: never): unknown {
    return option;
}
