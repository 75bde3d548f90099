export type SweepErrorKind =
  | "ConfigInvalid"
  | "ConfigKeyMissing"
  | "TemplateFileMissing"
  | "UnitExecutionFailure"
  | "ArtifactMissing"
  | "AmbiguousTypeTag";

export class SweepError extends Error {
  readonly kind: SweepErrorKind;

  constructor(kind: SweepErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "SweepError";
    this.kind = kind;
  }
}

export function isSweepError(err: unknown, kind?: SweepErrorKind): err is SweepError {
  return err instanceof SweepError && (kind === undefined || err.kind === kind);
}
