export type StackOrderErrorCode =
  | 'SCHEMA_VIOLATION'
  | 'INVALID_RUNNER_LABEL'
  | 'UNKNOWN_DEPENDENCY'
  | 'CYCLE_DETECTED'
  | 'INVALID_CONFIG';

/**
 * Base class for every fatal error raised while building or ordering the graph
 */
export abstract class StackOrderError extends Error {
  abstract readonly code: StackOrderErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class SchemaViolationError extends StackOrderError {
  readonly code = 'SCHEMA_VIOLATION';

  constructor(
    readonly filePath: string,
    readonly detail: string,
    options?: { cause?: unknown }
  ) {
    super(`${filePath} failed to validate against the JSON schema: ${detail}`, options);
  }
}

export class InvalidRunnerLabelError extends StackOrderError {
  readonly code = 'INVALID_RUNNER_LABEL';

  constructor(
    readonly filePath: string,
    readonly runnerLabel: string,
    readonly allowed: readonly string[]
  ) {
    super(
      `Invalid runner-label '${runnerLabel}' in ${filePath}: expected one of ${allowed.join(', ')}`
    );
  }
}

export class UnknownDependencyError extends StackOrderError {
  readonly code = 'UNKNOWN_DEPENDENCY';

  constructor(
    readonly stackId: string,
    readonly dependencyId: string
  ) {
    super(
      `Unknown dependency detected: non-existent ${dependencyId} referenced by ${stackId}`
    );
  }
}

export class CycleDetectedError extends StackOrderError {
  readonly code = 'CYCLE_DETECTED';

  constructor(
    readonly fromId: string,
    readonly toId: string
  ) {
    super(`Circular reference detected: ${fromId} -> ${toId}`);
  }
}

export class InvalidConfigError extends StackOrderError {
  readonly code = 'INVALID_CONFIG';

  constructor(readonly detail: string) {
    super(`Invalid configuration: ${detail}`);
  }
}

export const isStackOrderError = (error: unknown): error is StackOrderError =>
  error instanceof StackOrderError;
