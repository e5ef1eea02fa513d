import type { PlatformError } from "@effect/platform/Error";
import type { ParseError } from "effect/ParseResult";
import { Data } from "effect";
import type { ConfigDocumentName } from "./types.js";

export class ConfigSourceUnreadableError extends Data.TaggedError("ConfigSourceUnreadable")<{
  readonly document: ConfigDocumentName;
  readonly path: string;
  readonly message: string;
  readonly cause?: PlatformError;
}> {}

export class ConfigParseFailedError extends Data.TaggedError("ConfigParseFailed")<{
  readonly document: ConfigDocumentName;
  readonly path: string;
  readonly message: string;
  readonly cause?: ParseError;
}> {}

export class EmptyConfigDocumentError extends Data.TaggedError("EmptyConfigDocument")<{
  readonly document: ConfigDocumentName;
  readonly path: string;
}> {
  public override readonly message = `Configuration document is empty: ${this.path}`;
}

export type ConfigLoadError =
  | ConfigSourceUnreadableError
  | ConfigParseFailedError
  | EmptyConfigDocumentError;
