export * from './build-config';
export * from './defaults';
