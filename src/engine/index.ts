export * from './coordinator';
export * from './stage-runner';
export * from './state-machine';
