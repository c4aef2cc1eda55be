export * from './buildOptions';
export * from './constants';
export * from './createTableInput';
export * from './InvalidSchemaError';
export * from './mergeAttributeDefinitions';
export * from './options';
export * from './TableOption';
