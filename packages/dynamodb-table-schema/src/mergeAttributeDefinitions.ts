import { AttributeDefinition } from '@aws-sdk/client-dynamodb';
import { AttributeDeclaration } from './TableOption';

/**
 * Append the supplied attributes to a list of attribute definitions, skipping
 * any whose name is already defined. When one name is declared with two
 * types, the first declaration wins.
 */
export function mergeAttributeDefinitions(
    definitions: Array<AttributeDefinition>,
    ...attributes: Array<AttributeDeclaration>
): Array<AttributeDefinition> {
    const seen = new Set<string>();
    const merged: Array<AttributeDefinition> = [];

    for (const definition of definitions) {
        if (definition.AttributeName !== undefined) {
            seen.add(definition.AttributeName);
        }
        merged.push(definition);
    }

    for (const {name, type} of attributes) {
        if (seen.has(name)) {
            continue;
        }
        seen.add(name);
        merged.push({AttributeName: name, AttributeType: type});
    }

    return merged;
}
