import type { CommandKind } from "../lexer/tokens.js";

// ============================================================
// Base
// ============================================================

interface BaseNode {
  /** 1-based source line, only used for diagnostics. */
  line: number;
}

// ============================================================
// Program
// ============================================================

export interface Program extends BaseNode {
  kind: "Program";
  statements: Statement[];
}

// ============================================================
// Statements
// ============================================================

export type Statement = CommandStmt | AssignmentStmt | LabelStmt | JumpStmt;

export interface CommandStmt extends BaseNode {
  kind: "Command";
  /** Canonical casing, e.g. "DrawLine", whatever the source spelling. */
  name: CommandKind;
  args: Expr[];
}

export interface AssignmentStmt extends BaseNode {
  kind: "Assignment";
  variable: string;
  expr: Expr;
}

export interface LabelStmt extends BaseNode {
  kind: "Label";
  name: string;
}

export interface JumpStmt extends BaseNode {
  kind: "Jump";
  label: string;
  condition: Expr;
}

// ============================================================
// Expressions
// ============================================================

export type Expr = LiteralExpr | VariableExpr | BinaryExpr | CallExpr;

export type BinaryOp =
  | "+" | "-" | "*" | "/" | "%" | "**"
  | "==" | ">" | ">=" | "<" | "<="
  | "and" | "or";

export interface LiteralExpr extends BaseNode {
  kind: "Literal";
  value: number | string;
}

export interface VariableExpr extends BaseNode {
  kind: "Variable";
  name: string;
}

export interface BinaryExpr extends BaseNode {
  kind: "Binary";
  op: BinaryOp;
  left: Expr;
  right: Expr;
}

export interface CallExpr extends BaseNode {
  kind: "Call";
  /** Canonical casing for query functions, source spelling otherwise. */
  name: string;
  args: Expr[];
}
