import type {
  Program, Statement, CommandStmt, JumpStmt, Expr, BinaryExpr, CallExpr, VariableExpr,
} from "../ast/nodes.js";
import { TokenKind } from "../lexer/tokens.js";
import type { Point, RasterTarget } from "../canvas/canvas.js";
import { parseColor, TRANSPARENT, type Color } from "../canvas/colors.js";
import {
  BrushError, fail, executionError, semanticError, syntaxError, warning,
  type Diagnostic, type DiagnosticDetails,
} from "../errors/diagnostic.js";
import { getCommand, getFunction, type BrushBuiltin } from "../registry/builtins-registry.js";
import {
  boolValue, fromLiteral, intPow, intValue, truncDiv, truncMod, valuesEqual,
  type Value,
} from "./values.js";

export interface AgentState {
  position: Point;
  brushColor: Color;
  brushSize: number;
  spawned: boolean;
}

export interface TraceEvent {
  pc: number;
  statement: Statement;
}

export interface InterpreterOptions {
  /** Bind unknown variables to 0 with a warning instead of failing. */
  lenientVariables?: boolean;
  /** Called before each statement executes. */
  trace?: (event: TraceEvent) => void;
  filename?: string;
}

const ARITHMETIC = new Set(["+", "-", "*", "/", "%", "**"]);
const ORDERING = new Set([">", ">=", "<", "<="]);

/**
 * Tree-walking interpreter over a flat statement list. Control flow is a
 * single program counter moved by GoTo; there is no iteration limit.
 * All state is reset at the start of every `execute`.
 */
export class Interpreter {
  private options: InterpreterOptions;
  private canvas: RasterTarget | null = null;
  private variables = new Map<string, Value>();
  private labels = new Map<string, number>();
  private warnings: Diagnostic[] = [];
  private position: Point = { x: 0, y: 0 };
  private brushColor: Color = TRANSPARENT;
  private brushSize = 1;
  private spawned = false;
  private pc = 0;

  constructor(options: InterpreterOptions = {}) {
    this.options = options;
  }

  execute(program: Program, canvas: RasterTarget): AgentState {
    this.reset(canvas);
    try {
      this.collectLabels(program);

      const statements = program.statements;
      while (this.pc < statements.length) {
        const stmt = statements[this.pc];
        this.options.trace?.({ pc: this.pc, statement: stmt });
        try {
          this.pc = this.executeStatement(stmt, this.pc);
        } catch (e) {
          if (e instanceof BrushError) throw e.atLine(stmt.line);
          throw e;
        }
      }

      return this.state();
    } finally {
      this.canvas = null;
    }
  }

  /** Warnings recorded by the most recent run. */
  getWarnings(): Diagnostic[] {
    return [...this.warnings];
  }

  /** Variable bindings left by the most recent run. */
  getVariables(): ReadonlyMap<string, Value> {
    return new Map(this.variables);
  }

  state(): AgentState {
    return {
      position: { ...this.position },
      brushColor: this.brushColor,
      brushSize: this.brushSize,
      spawned: this.spawned,
    };
  }

  private reset(canvas: RasterTarget): void {
    this.canvas = canvas;
    this.variables.clear();
    this.labels.clear();
    this.warnings = [];
    this.position = { x: 0, y: 0 };
    this.brushColor = TRANSPARENT;
    this.brushSize = 1;
    this.spawned = false;
    this.pc = 0;
  }

  private collectLabels(program: Program): void {
    program.statements.forEach((stmt, index) => {
      if (stmt.kind !== "Label") return;
      if (this.labels.has(stmt.name)) {
        fail(semanticError(`Duplicate label '${stmt.name}'`, this.at(stmt)));
      }
      this.labels.set(stmt.name, index);
    });
  }

  // ============================================================
  // Statements
  // ============================================================

  /** Runs one statement and returns the next program counter. */
  private executeStatement(stmt: Statement, pc: number): number {
    switch (stmt.kind) {
      case "Label":
        return pc + 1;
      case "Assignment":
        this.variables.set(stmt.variable, this.evaluate(stmt.expr));
        return pc + 1;
      case "Jump":
        return this.executeJump(stmt, pc);
      case "Command":
        this.executeCommand(stmt);
        return pc + 1;
    }
  }

  private executeJump(stmt: JumpStmt, pc: number): number {
    const condition = this.evaluate(stmt.condition);
    if (condition.tag !== "Bool") {
      fail(executionError(`GoTo condition must be Bool, got ${condition.tag}`, this.at(stmt)));
    }
    if (!condition.value) return pc + 1;

    const target = this.labels.get(stmt.label);
    if (target === undefined) {
      fail(semanticError(`Undefined label '${stmt.label}'`, this.at(stmt)));
    }
    return target;
  }

  private executeCommand(stmt: CommandStmt): void {
    const builtin = getCommand(stmt.name);
    if (!builtin) {
      fail(syntaxError(`Unknown command '${stmt.name}'`, this.at(stmt)));
    }

    switch (builtin.name) {
      case TokenKind.Spawn: {
        if (this.spawned) {
          fail(semanticError("Spawn can only be called once per program", this.at(stmt)));
        }
        const args = this.evaluateArgs(builtin, stmt.args, stmt);
        const target = { x: this.intArg(builtin, args, 0, stmt), y: this.intArg(builtin, args, 1, stmt) };
        this.ensureInBounds(target, stmt, "Spawn position");
        this.position = target;
        this.spawned = true;
        return;
      }
      case TokenKind.Color: {
        const args = this.evaluateArgs(builtin, stmt.args, stmt);
        this.brushColor = this.colorArg(builtin, args, 0, stmt);
        return;
      }
      case TokenKind.Size: {
        const args = this.evaluateArgs(builtin, stmt.args, stmt);
        const size = this.intArg(builtin, args, 0, stmt);
        if (size <= 0) {
          fail(semanticError(`Brush size must be positive, got ${size}`, this.at(stmt)));
        }
        this.brushSize = size % 2 === 0 ? size - 1 : size;
        return;
      }
      case TokenKind.DrawLine: {
        const args = this.evaluateArgs(builtin, stmt.args, stmt);
        const end = this.step(builtin, args, stmt);
        this.ensureInBounds(end, stmt, "Line end");
        this.surface().drawLine(this.position, end, this.brushSize, this.brushColor);
        this.position = end;
        return;
      }
      case TokenKind.DrawCircle: {
        const args = this.evaluateArgs(builtin, stmt.args, stmt);
        const radius = this.intArg(builtin, args, 2, stmt);
        const center = this.step(builtin, args, stmt);
        this.ensureInBounds(center, stmt, "Circle center");
        this.surface().drawCircle(center, radius, this.brushSize, this.brushColor);
        this.position = center;
        return;
      }
      case TokenKind.DrawRectangle: {
        const args = this.evaluateArgs(builtin, stmt.args, stmt);
        const width = this.intArg(builtin, args, 3, stmt);
        const height = this.intArg(builtin, args, 4, stmt);
        const center = this.step(builtin, args, stmt);
        this.ensureInBounds(center, stmt, "Rectangle center");
        this.surface().drawRectangleBorder(center, width, height, this.brushSize, this.brushColor);
        this.position = center;
        return;
      }
      case TokenKind.Fill: {
        if (!this.spawned) {
          fail(semanticError("Fill needs the agent on the canvas; call Spawn first", this.at(stmt)));
        }
        this.evaluateArgs(builtin, stmt.args, stmt);
        this.surface().floodFill(this.position, this.brushColor);
        return;
      }
    }
  }

  /** Current position moved `distance` steps along the clamped direction in args 0..2. */
  private step(builtin: BrushBuiltin, args: Value[], stmt: CommandStmt): Point {
    const dx = clampDirection(this.intArg(builtin, args, 0, stmt));
    const dy = clampDirection(this.intArg(builtin, args, 1, stmt));
    const distance = this.intArg(builtin, args, 2, stmt);
    return { x: this.position.x + dx * distance, y: this.position.y + dy * distance };
  }

  // ============================================================
  // Expressions
  // ============================================================

  private evaluate(expr: Expr): Value {
    switch (expr.kind) {
      case "Literal":
        return fromLiteral(expr.value);
      case "Variable":
        return this.lookupVariable(expr);
      case "Binary":
        return this.evaluateBinary(expr);
      case "Call":
        return this.evaluateCall(expr);
    }
  }

  private lookupVariable(expr: VariableExpr): Value {
    const value = this.variables.get(expr.name);
    if (value !== undefined) return value;

    if (!this.options.lenientVariables) {
      fail(semanticError(`Undefined variable '${expr.name}'`, this.at(expr)));
    }
    const zero = intValue(0);
    this.variables.set(expr.name, zero);
    this.warnings.push(warning("semantic", `Variable '${expr.name}' used before assignment; initialised to 0`, this.at(expr)));
    return zero;
  }

  private evaluateBinary(expr: BinaryExpr): Value {
    const left = this.evaluate(expr.left);
    const right = this.evaluate(expr.right);
    const op = expr.op;
    const mismatch = (expected: string): never =>
      fail(executionError(
        `Operator '${op}' expects ${expected}, got ${left.tag} and ${right.tag}`,
        this.at(expr),
      ));

    if (ARITHMETIC.has(op)) {
      if (left.tag !== "Int" || right.tag !== "Int") return mismatch("Int operands");
      const a = left.value;
      const b = right.value;
      switch (op) {
        case "+": return intValue(a + b);
        case "-": return intValue(a - b);
        case "*": return intValue(Math.imul(a, b));
        case "**": return intValue(intPow(a, b));
        case "/":
          if (b === 0) fail(executionError("Division by zero", this.at(expr)));
          return intValue(truncDiv(a, b));
        default:
          if (b === 0) fail(executionError("Modulo by zero", this.at(expr)));
          return intValue(truncMod(a, b));
      }
    }

    if (op === "==") {
      if (left.tag !== right.tag) return mismatch("operands of the same type");
      return boolValue(valuesEqual(left, right));
    }

    if (ORDERING.has(op)) {
      if (left.tag === "Int" && right.tag === "Int") return boolValue(compare(op, left.value, right.value));
      if (left.tag === "String" && right.tag === "String") return boolValue(compare(op, left.value, right.value));
      return mismatch("two Int or two String operands");
    }

    if (left.tag !== "Bool" || right.tag !== "Bool") return mismatch("Bool operands");
    return boolValue(op === "and" ? left.value && right.value : left.value || right.value);
  }

  private evaluateCall(expr: CallExpr): Value {
    const builtin = getFunction(expr.name);
    if (!builtin) {
      fail(semanticError(`Unknown function '${expr.name}'`, this.at(expr)));
    }

    const args = this.evaluateArgs(builtin, expr.args, expr);
    switch (builtin.name) {
      case TokenKind.GetActualX:
        return intValue(this.position.x);
      case TokenKind.GetActualY:
        return intValue(this.position.y);
      case TokenKind.GetCanvasSize:
        return intValue(this.surface().size);
      case TokenKind.GetColorCount: {
        const color = this.colorArg(builtin, args, 0, expr);
        const corner1 = { x: this.intArg(builtin, args, 1, expr), y: this.intArg(builtin, args, 2, expr) };
        const corner2 = { x: this.intArg(builtin, args, 3, expr), y: this.intArg(builtin, args, 4, expr) };
        return intValue(this.surface().countColorInBox(color, corner1, corner2));
      }
      case TokenKind.IsBrushColor:
        return flag(this.brushColor === this.colorArg(builtin, args, 0, expr));
      case TokenKind.IsBrushSize:
        return flag(this.brushSize === this.intArg(builtin, args, 0, expr));
      case TokenKind.IsCanvasColor: {
        const color = this.colorArg(builtin, args, 0, expr);
        const vertical = this.intArg(builtin, args, 1, expr);
        const horizontal = this.intArg(builtin, args, 2, expr);
        const probe = { x: this.position.x + horizontal, y: this.position.y + vertical };
        this.ensureInBounds(probe, expr, "IsCanvasColor position");
        return flag(this.surface().colorAt(probe.x, probe.y) === color);
      }
    }
  }

  // ============================================================
  // Arguments
  // ============================================================

  private evaluateArgs(builtin: BrushBuiltin, args: Expr[], node: Statement | Expr): Value[] {
    if (args.length !== builtin.params.length) {
      const expected = builtin.params.length;
      fail(syntaxError(
        `${builtin.name} takes ${expected} argument${expected === 1 ? "" : "s"}, got ${args.length}`,
        this.at(node, builtin.params.map((p) => p.name).join(", ") || "no arguments"),
      ));
    }
    return args.map((arg) => this.evaluate(arg));
  }

  private intArg(builtin: BrushBuiltin, args: Value[], index: number, node: Statement | Expr): number {
    const value = args[index];
    if (value.tag !== "Int") return this.argumentMismatch(builtin, index, value, node);
    return value.value;
  }

  private colorArg(builtin: BrushBuiltin, args: Value[], index: number, node: Statement | Expr): Color {
    const value = args[index];
    if (value.tag !== "String") return this.argumentMismatch(builtin, index, value, node);
    const color = parseColor(value.value);
    if (color === undefined) {
      fail(semanticError(`Unknown color '${value.value}'`, this.at(node, `${builtin.name}, argument ${index + 1}`)));
    }
    return color;
  }

  private argumentMismatch(builtin: BrushBuiltin, index: number, value: Value, node: Statement | Expr): never {
    const param = builtin.params[index];
    return fail(executionError(
      `${builtin.name} expects ${param.type} for '${param.name}', got ${value.tag}`,
      this.at(node, `argument ${index + 1}`),
    ));
  }

  // ============================================================
  // Helpers
  // ============================================================

  private surface(): RasterTarget {
    if (!this.canvas) {
      fail(executionError("No canvas attached; the interpreter only draws inside execute()"));
    }
    return this.canvas;
  }

  private ensureInBounds(point: Point, node: Statement | Expr, what: string): void {
    const canvas = this.surface();
    if (!canvas.isInBounds(point.x, point.y)) {
      fail(executionError(
        `${what} (${point.x}, ${point.y}) is outside the ${canvas.size}x${canvas.size} canvas`,
        this.at(node),
      ));
    }
  }

  private at(node: Statement | Expr, context?: string): DiagnosticDetails {
    return { line: node.line, source: this.options.filename, context };
  }
}

function clampDirection(value: number): number {
  return Math.max(-1, Math.min(1, value));
}

function flag(condition: boolean): Value {
  return intValue(condition ? 1 : 0);
}

function compare<T extends number | string>(op: string, a: T, b: T): boolean {
  switch (op) {
    case ">": return a > b;
    case ">=": return a >= b;
    case "<": return a < b;
    default: return a <= b;
  }
}
