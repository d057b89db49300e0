import { TargetLanguage } from '../domain/language';

export interface LanguageDefaults {
  sourceDir: string;
  protocVersion: string;
  grpcVersion: string;
  runtimeVersion: string;
  /** Generate gRPC service stubs unless told otherwise. */
  grpc: boolean;
}

export const DEFAULT_PROTOC_VERSION = '25.1';

export const LANGUAGE_DEFAULTS: Record<TargetLanguage, LanguageDefaults> = {
  python: {
    sourceDir: 'proto',
    protocVersion: DEFAULT_PROTOC_VERSION,
    grpcVersion: '1.59.0',
    runtimeVersion: '3.11',
    grpc: true,
  },
  typescript: {
    sourceDir: 'proto',
    protocVersion: DEFAULT_PROTOC_VERSION,
    grpcVersion: '1.9.4',
    runtimeVersion: '20',
    grpc: false,
  },
  javascript: {
    sourceDir: 'proto',
    protocVersion: DEFAULT_PROTOC_VERSION,
    grpcVersion: '1.9.4',
    runtimeVersion: '18',
    grpc: false,
  },
};

/** Mount point of the project root inside every build container. */
export const CONTAINER_WORKSPACE = '/workspace';

/** Compose file, relative to the project root. */
export const COMPOSE_FILE = 'containers/docker-compose.yml';
