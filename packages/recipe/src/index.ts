export * from './errors';
export * from './types';
export * from './envConfig';
export * from './config';
export * from './logger';
export * from './descriptor';
export * from './manifest';
export * from './install';
export * from './conf';
export * from './diagnostics';
export * from './packager';
