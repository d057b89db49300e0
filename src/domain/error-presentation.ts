/**
 * Error presentation layer for surfacing actionable errors on the terminal.
 *
 * Maps TypedError codes to a severity, a short title, a user-facing message
 * and suggested actions. Rules match by code prefix, most specific first.
 */

import { TypedError } from './errors';

/** Severity levels for error presentation. */
export type ErrorSeverity = 'info' | 'warning' | 'error';

export interface ErrorPresentation {
  severity: ErrorSeverity;
  title: string;
  userMessage: string;
  /** Multi-line technical dump (code, stage, details). */
  technicalDetails?: string;
  retryable: boolean;
  suggestedActions: string[];
  errorCode: string;
  stage?: string;
}

/**
 * Rule for mapping a TypedError code pattern to a presentation.
 *
 * 'TOOLCHAIN' matches 'TOOLCHAIN.EXIT', 'TOOLCHAIN.TIMEOUT', etc.
 */
export interface ErrorPresentationRule {
  codePrefix: string;
  severity: ErrorSeverity;
  /** May use {stage}, {code}. */
  titleTemplate: string;
  /** May use {message}, {stage}, {code}. */
  messageTemplate: string;
  /** If undefined, inherits from TypedError.retryable. */
  retryable?: boolean;
  suggestedActions: string[];
}

export const DEFAULT_ERROR_PRESENTATION_RULES: ErrorPresentationRule[] = [
  {
    codePrefix: 'TOOLCHAIN.TIMEOUT',
    severity: 'warning',
    titleTemplate: 'Generator Timed Out',
    messageTemplate: 'A tool in the "{stage}" stage did not finish in time and was terminated.',
    suggestedActions: ['Raise --timeout', 'Check that the build container is healthy'],
  },
  {
    codePrefix: 'TOOLCHAIN.DOCKER_UNAVAILABLE',
    severity: 'error',
    titleTemplate: 'Docker Unavailable',
    messageTemplate: '{message}',
    suggestedActions: ['Start the Docker daemon', 'Check that the current user can reach the Docker socket'],
  },
  {
    codePrefix: 'TOOLCHAIN.NOT_FOUND',
    severity: 'error',
    titleTemplate: 'Tool Not Found',
    messageTemplate: '{message}',
    retryable: false,
    suggestedActions: ['Install the missing tool'],
  },
  {
    codePrefix: 'TOOLCHAIN',
    severity: 'error',
    titleTemplate: 'Code Generation Failed',
    messageTemplate: '{message}',
    suggestedActions: ['Run again with --verbose to see the full tool output', 'Check the .proto files for syntax errors'],
  },
  {
    codePrefix: 'WORKSPACE',
    severity: 'error',
    titleTemplate: 'Workspace Error',
    messageTemplate: '{message}',
    retryable: false,
    suggestedActions: ['Check the project directory layout and permissions'],
  },
  {
    codePrefix: 'POSTPROCESS',
    severity: 'error',
    titleTemplate: 'Post-processing Failed',
    messageTemplate: '{message}',
    retryable: false,
    suggestedActions: ['Inspect generated/code/ for the raw generator output'],
  },
  {
    codePrefix: 'PACKAGER.BUILDER_MISSING',
    severity: 'error',
    titleTemplate: 'Package Builder Missing',
    messageTemplate: '{message}',
    retryable: false,
    suggestedActions: ['Install the package builder for this language'],
  },
  {
    codePrefix: 'PACKAGER',
    severity: 'error',
    titleTemplate: 'Packaging Failed',
    messageTemplate: '{message}',
    suggestedActions: ['Inspect the package directory under generated/packages/'],
  },
  {
    codePrefix: 'CONFIG',
    severity: 'error',
    titleTemplate: 'Invalid Options',
    messageTemplate: '{message}',
    retryable: false,
    suggestedActions: ['Run with --help to see the accepted options'],
  },
  {
    codePrefix: 'PIPELINE',
    severity: 'error',
    titleTemplate: 'Pipeline Error',
    messageTemplate: '{message}',
    retryable: false,
    suggestedActions: [],
  },
];

/** Present a TypedError as a user-facing ErrorPresentation. */
export function presentError(
  error: TypedError,
  rules: ErrorPresentationRule[] = DEFAULT_ERROR_PRESENTATION_RULES,
): ErrorPresentation {
  const rule = rules.find((r) => error.code.startsWith(r.codePrefix));
  const fixActions = error.suggestedFixes.map((f) => f.description ?? `Apply fix: ${f.type}`);

  if (rule) {
    return {
      severity: rule.severity,
      title: interpolate(rule.titleTemplate, error),
      userMessage: interpolate(rule.messageTemplate, error),
      technicalDetails: formatTechnicalDetails(error),
      retryable: rule.retryable ?? error.retryable,
      suggestedActions: [...rule.suggestedActions, ...fixActions],
      errorCode: error.code,
      stage: error.stage,
    };
  }

  return {
    severity: 'error',
    title: 'Error',
    userMessage: error.message,
    technicalDetails: formatTechnicalDetails(error),
    retryable: error.retryable,
    suggestedActions: fixActions,
    errorCode: error.code,
    stage: error.stage,
  };
}

function interpolate(template: string, error: TypedError): string {
  return template
    .replace(/\{message\}/g, error.message)
    .replace(/\{stage\}/g, error.stage ?? 'unknown')
    .replace(/\{code\}/g, error.code);
}

function formatTechnicalDetails(error: TypedError): string {
  const parts: string[] = [
    `Code: ${error.code}`,
    `Message: ${error.message}`,
    `Retryable: ${error.retryable}`,
  ];
  if (error.stage) parts.push(`Stage: ${error.stage}`);
  if (error.runId) parts.push(`Run: ${error.runId}`);
  if (error.details) {
    parts.push(`Details: ${JSON.stringify(error.details, null, 2)}`);
  }
  if (error.suggestedFixes.length > 0) {
    parts.push(`Fixes: ${error.suggestedFixes.map((f) => f.type).join(', ')}`);
  }
  return parts.join('\n');
}
