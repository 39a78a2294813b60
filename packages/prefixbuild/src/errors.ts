/**
 * Errors that end a command. Each carries the exit code the CLI uses.
 * Phase failures are not errors; they come back in a BuildResult.
 */
export class PrefixbuildError extends Error {
  readonly exitCode: number;

  constructor(message: string, exitCode: number = 1) {
    super(message);
    this.name = new.target.name;
    this.exitCode = exitCode;
  }
}

export class PrefixNotSetError extends PrefixbuildError {
  constructor() {
    super('PREFIX is not set. Export PREFIX or pass --prefix <dir>.', 2);
  }
}

export class RecipeError extends PrefixbuildError {
  readonly details: string[];

  constructor(message: string, details: string[] = []) {
    super(details.length > 0 ? `${message}\n  ${details.join('\n  ')}` : message);
    this.details = details;
  }
}

export class ConfigError extends PrefixbuildError {
  readonly details: string[];

  constructor(message: string, details: string[] = []) {
    super(details.length > 0 ? `${message}\n  ${details.join('\n  ')}` : message);
    this.details = details;
  }
}

export class BatchInputError extends PrefixbuildError {
  readonly line: number;

  constructor(line: number, content: string) {
    super(`Line ${line}: expected "<name> <version> <path>", got "${content}"`);
    this.line = line;
  }
}

export class NotInProjectError extends PrefixbuildError {
  constructor() {
    super('Not in a prefixbuild project. Run `prefixbuild init` first, or run from a directory with .prefixbuild/');
  }
}

export function exitCodeOf(err: unknown): number {
  return err instanceof PrefixbuildError ? err.exitCode : 1;
}
