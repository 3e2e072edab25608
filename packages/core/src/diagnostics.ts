import type { Diagnostic, DiagnosticKind, DiagnosticSeverity, ParseMode } from "./types.js";

export const DIAGNOSTIC_SEVERITY: Record<DiagnosticKind, DiagnosticSeverity> = {
  DuplicateMetadataKey: "warning",
  MetadataAfterStructuralContent: "warning",
  DuplicateDocumentTitle: "warning",
  OrphanTextLine: "error",
  OrphanScene: "info",
  DuplicateSpeakerInCue: "warning",
  NestedInlineDirection: "error",
  UnmatchedClosingBrace: "error",
  UnterminatedInlineDirection: "warning",
  UnterminatedBlockAtEOF: "info",
  ElementOutsideScene: "error",
  UndeclaredCharacter: "warning",
  DuplicateIntroduction: "warning",
  InvalidIntroduction: "warning",
};

/**
 * Thrown in strict mode for the first error-severity diagnostic.
 */
export class ParseError extends Error {
  public readonly code = "PARSE_ERROR";

  constructor(public readonly diagnostic: Diagnostic) {
    super(`line ${diagnostic.line}: ${diagnostic.message}`);
    this.name = "ParseError";
  }

  get kind(): DiagnosticKind {
    return this.diagnostic.kind;
  }

  get line(): number {
    return this.diagnostic.line;
  }
}

export class DiagnosticsCollector {
  private readonly items: Diagnostic[] = [];

  constructor(public readonly mode: ParseMode) {}

  report(kind: DiagnosticKind, line: number, message: string): Diagnostic {
    const diagnostic: Diagnostic = { kind, severity: DIAGNOSTIC_SEVERITY[kind], line, message };
    this.items.push(diagnostic);
    if (this.mode === "strict" && diagnostic.severity === "error") throw new ParseError(diagnostic);
    return diagnostic;
  }

  // Stable sort keeps report order within a line.
  list(): Diagnostic[] {
    return this.items
      .map((d, i) => ({ d, i }))
      .sort((a, b) => a.d.line - b.d.line || a.i - b.i)
      .map(({ d }) => d);
  }
}
