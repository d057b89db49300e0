export * from './workspace-manager';
