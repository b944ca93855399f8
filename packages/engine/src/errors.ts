/**
 * Error taxonomy for the scheduling engine.
 *
 * Only ConfigurationError (and its subclasses) is fatal: it aborts startup
 * before the control loop begins. Every other kind is caught at the action
 * or module boundary, logged with its module/action context, and execution
 * continues.
 */

export class SolsticeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SolsticeError';
  }
}

/** Malformed module definitions, unresolvable triggers, dependency cycles */
export class ConfigurationError extends SolsticeError {
  public readonly errors: string[];

  constructor(message: string, errors: string[] = []) {
    super(errors.length > 0 ? `${message}: ${errors.join('; ')}` : message);
    this.name = 'ConfigurationError';
    this.errors = errors;
  }
}

/** A module source (directory or GitHub repository) could not be obtained */
export class ModuleSourceError extends ConfigurationError {
  constructor(message: string) {
    super(message);
    this.name = 'ModuleSourceError';
  }
}

/** A module's requirements are not met; disables that module only */
export class RequirementFailure extends SolsticeError {
  public readonly module: string;

  constructor(module: string, message: string) {
    super(message);
    this.name = 'RequirementFailure';
    this.module = module;
  }
}

/** A single action failed: missing file, failed render, non-zero exit, timeout */
export class ActionFailure extends SolsticeError {
  public readonly module: string;
  public readonly action: string;

  constructor(module: string, action: string, message: string) {
    super(message);
    this.name = 'ActionFailure';
    this.module = module;
    this.action = action;
  }
}

/** A `{placeholder}` referenced a template that has not been compiled yet */
export class PlaceholderUnresolved extends SolsticeError {
  public readonly placeholder: string;

  constructor(placeholder: string) {
    super(`Placeholder "{${placeholder}}" has no compilation target yet`);
    this.name = 'PlaceholderUnresolved';
    this.placeholder = placeholder;
  }
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
