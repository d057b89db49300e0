export * from './all';
export * from './build';
export * from './clean';
export * from './options';
export * from './status';
