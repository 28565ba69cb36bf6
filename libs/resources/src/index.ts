export * from './apiResource';
export * from './episode';
export * from './subscriber';
