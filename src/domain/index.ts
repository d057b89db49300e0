/**
 * Domain model exports.
 */

export * from './artifact';
export * from './error-presentation';
export * from './errors';
export * from './generated-unit';
export * from './language';
export * from './pipeline';
export * from './workspace';
