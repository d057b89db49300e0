export * from './entry-points';
export * from './format';
export * from './python-package';
export * from './relocate';
