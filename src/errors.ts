import type { StageName } from "./schemas/artifacts";

export type EsgWorkflowErrorCode = "STAGE_EXECUTION" | "PERSISTENCE" | "NOT_FOUND" | "VALIDATION";

export class EsgWorkflowError extends Error {
  constructor(
    message: string,
    public readonly code: EsgWorkflowErrorCode,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "EsgWorkflowError";
  }
}

/**
 * A single stage failed: a declared upstream artifact was missing, or the
 * content-generation capability failed, timed out or returned unusable output.
 * The message is always prefixed with the stage name.
 */
export class StageExecutionError extends EsgWorkflowError {
  constructor(
    public readonly stage: StageName,
    public readonly detail: string,
    options?: { cause?: unknown },
  ) {
    super(`${stage}: ${detail}`, "STAGE_EXECUTION", options);
    this.name = "StageExecutionError";
  }
}

export class PersistenceError extends EsgWorkflowError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "PERSISTENCE", options);
    this.name = "PersistenceError";
  }
}

export class NotFoundError extends EsgWorkflowError {
  constructor(message: string) {
    super(message, "NOT_FOUND");
    this.name = "NotFoundError";
  }
}

export class ValidationError extends EsgWorkflowError {
  constructor(
    message: string,
    public readonly issues: string[] = [],
  ) {
    super(message, "VALIDATION");
    this.name = "ValidationError";
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === "string") {
    return error;
  }

  return "unknown error";
}
