export * from './manifest';
export * from './packager';
