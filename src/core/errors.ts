// src/core/errors.ts

export type StreamErrorCode =
  | "TruncatedRecord"
  | "TruncatedStream"
  | "UndeterminedEndianness";

export type GrammarErrorCode =
  | "MissingRequiredRecord"
  | "RecordOutOfOrder"
  | "MalformedFixedPayload"
  | "DuplicateStructureName";

export type ConfigErrorCode =
  | "InvalidWindow"
  | "InvalidLayerRule"
  | "InvalidLayerConfig";

export type GeometryErrorCode = "DegeneratePolygon" | "InvalidZRange";

export type HandleErrorCode = "InvalidHandle" | "IndexOutOfRange";

export type LayoutErrorCode =
  | StreamErrorCode
  | GrammarErrorCode
  | ConfigErrorCode
  | GeometryErrorCode
  | HandleErrorCode;

/**
 * Base class for every failure this library raises on purpose.
 * `offset` is the byte position in the stream, when one applies.
 */
export class LayoutError extends Error {
  readonly code: LayoutErrorCode;
  readonly offset?: number;

  constructor(code: LayoutErrorCode, message: string, offset?: number) {
    super(offset !== undefined ? `${message} (at byte ${offset})` : message);
    this.name = "LayoutError";
    this.code = code;
    this.offset = offset;
  }
}

/** Bytes ran out, or the byte order could not be settled. Aborts a parse. */
export class StreamError extends LayoutError {
  declare readonly code: StreamErrorCode;

  constructor(code: StreamErrorCode, message: string, offset?: number) {
    super(code, message, offset);
    this.name = "StreamError";
  }
}

/** The record sequence breaks the stream grammar. Aborts a parse. */
export class GrammarError extends LayoutError {
  declare readonly code: GrammarErrorCode;

  constructor(code: GrammarErrorCode, message: string, offset?: number) {
    super(code, message, offset);
    this.name = "GrammarError";
  }
}

export class ConfigError extends LayoutError {
  declare readonly code: ConfigErrorCode;

  constructor(code: ConfigErrorCode, message: string) {
    super(code, message);
    this.name = "ConfigError";
  }
}

export class GeometryError extends LayoutError {
  declare readonly code: GeometryErrorCode;

  constructor(code: GeometryErrorCode, message: string) {
    super(code, message);
    this.name = "GeometryError";
  }
}

export class HandleError extends LayoutError {
  declare readonly code: HandleErrorCode;

  constructor(code: HandleErrorCode, message: string) {
    super(code, message);
    this.name = "HandleError";
  }
}

export function isLayoutError(err: unknown): err is LayoutError {
  return err instanceof LayoutError;
}

/**
 * Render any thrown value as a single line message.
 */
export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
