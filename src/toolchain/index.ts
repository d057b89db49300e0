export * from './container';
export * from './invoker';
export * from './process-runner';
