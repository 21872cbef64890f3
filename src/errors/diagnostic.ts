export type Severity = "error" | "warning";

export type ErrorKind = "syntax" | "semantic" | "execution";

export interface Diagnostic {
  severity: Severity;
  kind: ErrorKind;
  message: string;
  /** 1-based source line; 0 when unknown. */
  line: number;
  column?: number;
  context?: string;
  source: string;
}

export interface DiagnosticDetails {
  line?: number;
  column?: number;
  context?: string;
  source?: string;
}

function make(severity: Severity, kind: ErrorKind, message: string, details: DiagnosticDetails): Diagnostic {
  return {
    severity,
    kind,
    message,
    line: details.line ?? 0,
    column: details.column,
    context: details.context,
    source: details.source ?? "<stdin>",
  };
}

export function syntaxError(message: string, details: DiagnosticDetails = {}): Diagnostic {
  return make("error", "syntax", message, details);
}

export function semanticError(message: string, details: DiagnosticDetails = {}): Diagnostic {
  return make("error", "semantic", message, details);
}

export function executionError(message: string, details: DiagnosticDetails = {}): Diagnostic {
  return make("error", "execution", message, details);
}

export function warning(kind: ErrorKind, message: string, details: DiagnosticDetails = {}): Diagnostic {
  return make("warning", kind, message, details);
}

/**
 * Thrown by the lexer and the interpreter. The parser catches it per statement
 * and keeps going; everything else lets it reach the runner.
 */
export class BrushError extends Error {
  readonly diagnostic: Diagnostic;

  constructor(diagnostic: Diagnostic) {
    super(diagnostic.line > 0 ? `[line ${diagnostic.line}] ${diagnostic.message}` : diagnostic.message);
    this.name = "BrushError";
    this.diagnostic = diagnostic;
  }

  get kind(): ErrorKind {
    return this.diagnostic.kind;
  }

  get line(): number {
    return this.diagnostic.line;
  }

  /** Same error, placed on `line` unless it already has a line of its own. */
  atLine(line: number): BrushError {
    if (this.diagnostic.line > 0) return this;
    return new BrushError({ ...this.diagnostic, line });
  }

  /** Same error with extra context prepended, optionally re-classified. */
  withContext(context: string, kind?: ErrorKind): BrushError {
    const merged = this.diagnostic.context ? `${context} | ${this.diagnostic.context}` : context;
    return new BrushError({ ...this.diagnostic, kind: kind ?? this.diagnostic.kind, context: merged });
  }
}

export function fail(diagnostic: Diagnostic): never {
  throw new BrushError(diagnostic);
}
