/**
 * Error taxonomy for the conversion pipeline.
 *
 * Every failure is one of a closed set of kinds. Each error carries a
 * machine-readable `reason`, a description of the offending construct when
 * one is known, and the file being processed once a caller attaches it.
 */

export type BookErrorKind =
  | "tokenization"
  | "build"
  | "extraction"
  | "render"
  | "io"
  | "config";

export abstract class BookError<TReason extends string = string> extends Error {
  abstract readonly kind: BookErrorKind;
  file?: string;

  constructor(
    public readonly reason: TReason,
    message: string,
    public readonly offending?: string,
    options?: ErrorOptions
  ) {
    super(offending === undefined ? message : `${message}: ${offending}`, options);
    this.name = new.target.name;
  }

  /** Record the file this error surfaced in. Only the innermost file is kept. */
  inFile(file: string): this {
    if (this.file === undefined) {
      this.file = file;
      this.message = `${file}: ${this.message}`;
    }
    return this;
  }
}

export type TokenizationReason = "parse-failed" | "unsupported-token";

export class TokenizationError extends BookError<TokenizationReason> {
  readonly kind = "tokenization" as const;
}

export type BuildReason =
  | "unexpected-event"
  | "unexpected-list-event"
  | "unexpected-table-event"
  | "unexpected-row-event";

export class BuildError extends BookError<BuildReason> {
  readonly kind = "build" as const;
}

export type ExtractionReason =
  | "sublist-without-entry"
  | "unexpected-list-item"
  | "unexpected-paragraph-item"
  | "unexpected-element";

export class ExtractionError extends BookError<ExtractionReason> {
  readonly kind = "extraction" as const;
}

export type RenderReason =
  | "non-text-in-code-block"
  | "unexpected-format"
  | "unknown-element";

export class RenderError extends BookError<RenderReason> {
  readonly kind = "render" as const;
}

export type IoReason = "open-failed" | "read-failed" | "write-failed";

export class BookIoError extends BookError<IoReason> {
  readonly kind = "io" as const;
}

export type ConfigReason = "invalid-config";

export class ConfigError extends BookError<ConfigReason> {
  readonly kind = "config" as const;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
