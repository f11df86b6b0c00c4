export type CoachErrorKind =
  | "configuration"
  | "input_validation"
  | "image"
  | "external_call"
  | "structural"
  | "persistence"
  | "not_found";

/**
 * Base error for every failure the pipeline reports. `status` is used by the
 * HTTP error middleware, `hints` are printed by the CLI under the message.
 */
export class CoachError extends Error {
  readonly kind: CoachErrorKind;
  readonly status: number;
  readonly retryable: boolean;
  readonly hints: string[];

  constructor(
    kind: CoachErrorKind,
    message: string,
    options: { status?: number; retryable?: boolean; hints?: string[]; cause?: unknown } = {}
  ) {
    super(message, { cause: options.cause });
    this.name = new.target.name;
    this.kind = kind;
    this.status = options.status ?? 500;
    this.retryable = options.retryable ?? false;
    this.hints = options.hints ?? [];
  }
}

export class ConfigurationError extends CoachError {
  constructor(message: string, hints: string[] = []) {
    super("configuration", message, { status: 500, hints });
  }
}

export class InputValidationError extends CoachError {
  constructor(message: string) {
    super("input_validation", message, { status: 400 });
  }
}

export class ImageError extends CoachError {
  constructor(message: string, cause?: unknown) {
    super("image", message, { status: 400, cause });
  }
}

export class ModelCallError extends CoachError {
  constructor(
    message: string,
    options: { status?: number; retryable?: boolean; hints?: string[]; cause?: unknown } = {}
  ) {
    super("external_call", message, { status: 502, ...options });
  }
}

export class PlanStructureError extends CoachError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super("structural", message, { status: 422 });
    this.issues = issues;
  }
}

export class PersistenceError extends CoachError {
  constructor(message: string, cause?: unknown) {
    super("persistence", message, { status: 500, cause });
  }
}

export class PlanNotFoundError extends CoachError {
  constructor(planId: number) {
    super("not_found", `Plan with ID ${planId} not found`, { status: 404 });
  }
}

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
