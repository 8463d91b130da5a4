// src/core/diagnostics.ts

export type DiagnosticSeverity = "info" | "warning";

export type DiagnosticCode =
  | "unknown-record"
  | "misplaced-record"
  | "xy-remainder"
  | "malformed-element"
  | "missing-units"
  | "duplicate-layer"
  | "thickness-inconsistent"
  | "invalid-color"
  | "degenerate-polygon"
  | "path-conversion-failed"
  | "clip-failed"
  | "extrusion-failed"
  | "unresolved-reference"
  | "missing-structure"
  | "reference-cycle"
  | "max-depth"
  | "absolute-transform";

export interface Diagnostic {
  severity: DiagnosticSeverity;
  code: DiagnosticCode;
  message: string;
  offset?: number;
}

/**
 * Accumulates recoverable problems next to a result instead of throwing.
 * Callers read `items` once the operation that filled it returns.
 */
export class DiagnosticList {
  private readonly entries: Diagnostic[] = [];

  get items(): readonly Diagnostic[] {
    return this.entries;
  }

  get length(): number {
    return this.entries.length;
  }

  warn(code: DiagnosticCode, message: string, offset?: number): void {
    this.entries.push({ severity: "warning", code, message, offset });
  }

  info(code: DiagnosticCode, message: string, offset?: number): void {
    this.entries.push({ severity: "info", code, message, offset });
  }

  append(other: Iterable<Diagnostic>): void {
    for (const d of other) this.entries.push(d);
  }

  count(code: DiagnosticCode): number {
    return this.entries.filter((d) => d.code === code).length;
  }

  toArray(): Diagnostic[] {
    return this.entries.slice();
  }
}
