import { Lexer } from "./lexer/lexer.js";
import { Parser } from "./parser/parser.js";
import { Interpreter, type AgentState, type TraceEvent } from "./interpreter/interpreter.js";
import { TokenKind, type Token } from "./lexer/tokens.js";
import type { Program, Statement } from "./ast/nodes.js";
import type { RasterTarget } from "./canvas/canvas.js";
import { BrushError, executionError, semanticError, type Diagnostic } from "./errors/diagnostic.js";

export interface RunOptions {
  filename?: string;
  /** Lex and parse only; the canvas is left untouched. */
  checkOnly?: boolean;
  lenientVariables?: boolean;
  /** Reject programs whose first statement is not a Spawn command. */
  requireSpawnFirst?: boolean;
  trace?: (event: TraceEvent) => void;
}

export interface RunResult {
  tokens?: Token[];
  program?: Program;
  /** Final agent state; present only when the program ran to the end. */
  state?: AgentState;
  /** Fatal diagnostics. Non-empty means the run failed. */
  errors: Diagnostic[];
  warnings: Diagnostic[];
}

/**
 * Tokenize, parse and execute `source` against `canvas`.
 * The canvas keeps whatever was drawn before a runtime error.
 */
export function run(source: string, canvas: RasterTarget, options: RunOptions = {}): RunResult {
  const filename = options.filename ?? "<stdin>";

  // 1. Lex
  let tokens: Token[];
  try {
    tokens = new Lexer(source, filename).tokenize();
  } catch (e) {
    return { errors: [toDiagnostic(e, filename)], warnings: [] };
  }

  // 2. Parse
  const { program, errors: parseErrors } = new Parser(tokens, filename).parse();
  if (parseErrors.length > 0) {
    return { tokens, program, errors: parseErrors, warnings: [] };
  }

  if (options.requireSpawnFirst) {
    const first: Statement | undefined = program.statements[0];
    if (!first || first.kind !== "Command" || first.name !== TokenKind.Spawn) {
      const error = semanticError("Program must start with Spawn", {
        line: first?.line ?? 1,
        source: filename,
        context: "place the agent with Spawn(x, y) before anything else",
      });
      return { tokens, program, errors: [error], warnings: [] };
    }
  }

  if (options.checkOnly) {
    return { tokens, program, errors: [], warnings: [] };
  }

  // 3. Execute
  const interpreter = new Interpreter({
    filename,
    lenientVariables: options.lenientVariables,
    trace: options.trace,
  });
  try {
    const state = interpreter.execute(program, canvas);
    return { tokens, program, state, errors: [], warnings: interpreter.getWarnings() };
  } catch (e) {
    return { tokens, program, errors: [toDiagnostic(e, filename)], warnings: interpreter.getWarnings() };
  }
}

function toDiagnostic(e: unknown, filename: string): Diagnostic {
  if (e instanceof BrushError) return e.diagnostic;
  const msg = e instanceof Error ? e.message : String(e);
  return executionError(`Internal error: ${msg}`, { source: filename });
}

export { Canvas, DEFAULT_CANVAS_SIZE, MAX_CANVAS_SIZE, MIN_CANVAS_SIZE, type Point, type RasterTarget } from "./canvas/canvas.js";
export { NAMED_COLORS, colorName, parseColor, type Color } from "./canvas/colors.js";
export { encodePpm } from "./canvas/ppm.js";
export { tokenize } from "./lexer/lexer.js";
export { parse } from "./parser/parser.js";
export { Interpreter, type AgentState, type InterpreterOptions, type TraceEvent } from "./interpreter/interpreter.js";
export { BrushError, type Diagnostic, type ErrorKind } from "./errors/diagnostic.js";
export { formatDiagnostic, formatDiagnostics } from "./errors/reporter.js";
