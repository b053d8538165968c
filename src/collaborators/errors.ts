/**
 * Collaborator failures: warehouse, documentation search, generator,
 * connection catalog and project analyzer.
 *
 * These are downstream failures, never policy violations. The dispatcher
 * reports them tagged as "collaborator_error" so a caller can tell "fix
 * your request" apart from "something downstream failed".
 */

export type CollaboratorName =
  | "warehouse"
  | "docs_search"
  | "generator"
  | "connections"
  | "project_analyzer"
  | "knowledge";

export type CollaboratorErrorKind =
  | "connectivity"
  | "query"
  | "invalid_request"
  | "unavailable"
  | "invalid_response"
  | "unexpected";

export interface CollaboratorFailure {
  collaborator: CollaboratorName;
  kind: CollaboratorErrorKind;
  message: string;
  details: Record<string, unknown>;
}

export class CollaboratorError extends Error {
  public readonly collaborator: CollaboratorName;
  public readonly kind: CollaboratorErrorKind;
  public readonly details: Record<string, unknown>;

  constructor(
    message: string,
    collaborator: CollaboratorName,
    kind: CollaboratorErrorKind,
    details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = "CollaboratorError";
    this.collaborator = collaborator;
    this.kind = kind;
    this.details = details ?? {};
  }

  toFailure(): CollaboratorFailure {
    return {
      collaborator: this.collaborator,
      kind: this.kind,
      message: this.message,
      details: this.details,
    };
  }
}

/**
 * Normalize anything a collaborator threw. CollaboratorErrors keep their
 * shape; anything else is reported as "unexpected" for the given
 * collaborator.
 */
export function toCollaboratorFailure(
  err: unknown,
  collaborator: CollaboratorName,
): CollaboratorFailure {
  if (err instanceof CollaboratorError) {
    return err.toFailure();
  }
  return {
    collaborator,
    kind: "unexpected",
    message: err instanceof Error ? err.message : String(err),
    details: {},
  };
}
