export * from './types';
export * from './headers';
export * from './apiResponse';
export * from './encoding';
export * from './requestContext';
export * from './retryPolicy';
export * from './errors/errors';
export * from './errors/classifier';
export * from './logger';
export * from './config';
export * from './userAgent';
export * from './version';
export * from './session';
export * from './ApiClient';
export * from './defaultClient';
export * from './factories';
export * from './transport/failures';
export * from './transport/fetchTransport';
export * from './transport/undiciTransport';
