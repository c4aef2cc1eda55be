export * from './RequestOptions';
export * from './TableConfiguration';
