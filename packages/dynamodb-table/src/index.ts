export * from './constants';
export * from './isServiceError';
export * from './Logger';
export * from './namedParameters';
export * from './Table';
export * from './TableLifecycleClient';
