import { TokenKind, type CommandKind, type Token } from "../lexer/tokens.js";
import { isCommandKind, isFunctionKind } from "../lexer/keywords.js";
import { BrushError, fail, syntaxError, type Diagnostic, type ErrorKind } from "../errors/diagnostic.js";
import { brushHint, describeToken, unexpectedToken } from "./errors.js";
import type {
  Program, Statement, CommandStmt, AssignmentStmt, LabelStmt, JumpStmt,
  Expr, BinaryOp, CallExpr,
} from "../ast/nodes.js";

/** Parsing stops once this many statements have failed. */
export const MAX_PARSE_ERRORS = 50;

const JUMP_SHAPE = "expected GoTo[label](condition)";

export class Parser {
  private tokens: Token[];
  private pos: number = 0;
  private errors: Diagnostic[] = [];
  private filename: string;

  constructor(tokens: Token[], filename: string = "<stdin>") {
    this.tokens = tokens;
    this.filename = filename;
  }

  parse(): { program: Program; errors: Diagnostic[] } {
    const program = this.parseProgram();
    return { program, errors: this.errors };
  }

  // ============================================================
  // Program
  // ============================================================

  private parseProgram(): Program {
    const statements: Statement[] = [];

    while (!this.isAtEnd() && this.errors.length < MAX_PARSE_ERRORS) {
      if (this.peek().kind === TokenKind.NewLine) {
        this.advance();
        continue;
      }

      try {
        const stmt = this.parseStatement();
        this.expectEndOfStatement();
        statements.push(stmt);
      } catch (e) {
        if (!(e instanceof BrushError)) throw e;
        this.errors.push(e.diagnostic);
        this.synchronize();
      }
    }

    return { kind: "Program", statements, line: 1 };
  }

  // ============================================================
  // Statements
  // ============================================================

  private parseStatement(): Statement {
    const tok = this.peek();

    if (tok.kind === TokenKind.Identifier && this.peekNext().kind === TokenKind.Assign) {
      return this.parseAssignment();
    }
    if (tok.kind === TokenKind.GoTo) return this.parseJump();
    if (isCommandKind(tok.kind)) return this.parseCommand(tok.kind);
    if (tok.kind === TokenKind.Identifier && this.isLineEnd(this.peekNext())) {
      return this.parseLabel();
    }

    const hint = brushHint(tok);
    return fail(syntaxError("No valid instruction", {
      line: tok.line,
      column: tok.column,
      source: this.filename,
      context: hint ?? `unexpected token ${describeToken(tok)}`,
    }));
  }

  private parseAssignment(): AssignmentStmt {
    const name = this.advance();
    this.advance(); // skip '<-'
    const expr = this.parseExpr();
    return { kind: "Assignment", variable: name.lexeme, expr, line: name.line };
  }

  private parseCommand(name: CommandKind): CommandStmt {
    const start = this.advance();
    try {
      this.expect(TokenKind.LParen, `'(' after ${name}`);
      const args = this.parseArgList((index) => `Argument ${index}`, "syntax");
      this.expect(TokenKind.RParen, `')' after the arguments of ${name}`);
      return { kind: "Command", name, args, line: start.line };
    } catch (e) {
      return this.rethrow(e, `Command: ${name}`, "syntax");
    }
  }

  private parseJump(): JumpStmt {
    const start = this.advance();
    try {
      this.expect(TokenKind.LBracket, "'[' after GoTo");
      const label = this.expect(TokenKind.Identifier, "a label name");
      this.expect(TokenKind.RBracket, "']' after the label name");
      this.expect(TokenKind.LParen, "'(' before the jump condition");
      const condition = this.parseExpr();
      this.expect(TokenKind.RParen, "')' after the jump condition");
      return { kind: "Jump", label: label.lexeme, condition, line: start.line };
    } catch (e) {
      return this.rethrow(e, JUMP_SHAPE);
    }
  }

  private parseLabel(): LabelStmt {
    const tok = this.advance();
    return { kind: "Label", name: tok.lexeme, line: tok.line };
  }

  // ============================================================
  // Expressions (Pratt parser for binary ops)
  // ============================================================

  parseExpr(minPrec: number = 0): Expr {
    let left = this.parseUnary();

    while (true) {
      const prec = this.binaryPrecedence(this.peek());
      if (prec <= minPrec) break;

      const opToken = this.advance();
      const right = this.parseExpr(prec);
      left = {
        kind: "Binary",
        op: this.tokenToBinaryOp(opToken),
        left,
        right,
        line: opToken.line,
      };
    }

    return left;
  }

  private parseUnary(): Expr {
    const tok = this.peek();
    if (tok.kind === TokenKind.Minus) {
      this.advance();
      const operand = this.parseUnary();
      return {
        kind: "Binary",
        op: "-",
        left: { kind: "Literal", value: 0, line: tok.line },
        right: operand,
        line: tok.line,
      };
    }
    return this.parsePrimary();
  }

  private parsePrimary(): Expr {
    const tok = this.peek();

    switch (tok.kind) {
      case TokenKind.Number:
      case TokenKind.String: {
        this.advance();
        return { kind: "Literal", value: tok.literal ?? tok.lexeme, line: tok.line };
      }
      case TokenKind.LParen: {
        this.advance();
        const expr = this.parseExpr();
        this.expect(TokenKind.RParen, "')' to close the parenthesized expression");
        return expr;
      }
      case TokenKind.Identifier: {
        this.advance();
        if (this.peek().kind === TokenKind.LParen) {
          return this.parseCall(tok, tok.lexeme);
        }
        return { kind: "Variable", name: tok.lexeme, line: tok.line };
      }
    }

    if (isFunctionKind(tok.kind) && this.peekNext().kind === TokenKind.LParen) {
      this.advance();
      return this.parseCall(tok, tok.kind);
    }

    return fail(unexpectedToken(tok, this.filename, "a primary expression", "invalid primary expression"));
  }

  private parseCall(start: Token, name: string): CallExpr {
    try {
      this.expect(TokenKind.LParen, `'(' after ${name}`);
      const args = this.parseArgList((index) => `Argument ${index}`);
      this.expect(TokenKind.RParen, `')' after the arguments of ${name}`);
      return { kind: "Call", name, args, line: start.line };
    } catch (e) {
      return this.rethrow(e, `Function: ${name}`, "semantic");
    }
  }

  private parseArgList(label: (index: number) => string, kind?: ErrorKind): Expr[] {
    const args: Expr[] = [];
    if (this.peek().kind === TokenKind.RParen) return args;

    do {
      try {
        args.push(this.parseExpr());
      } catch (e) {
        this.rethrow(e, label(args.length + 1), kind);
      }
    } while (this.match(TokenKind.Comma));
    return args;
  }

  // ============================================================
  // Operator Precedence
  // ============================================================

  private binaryPrecedence(token: Token): number {
    switch (token.kind) {
      case TokenKind.Or: return 1;
      case TokenKind.And: return 2;
      case TokenKind.Equal: return 3;
      case TokenKind.Greater:
      case TokenKind.GreaterEqual:
      case TokenKind.Less:
      case TokenKind.LessEqual: return 4;
      case TokenKind.Plus:
      case TokenKind.Minus: return 5;
      case TokenKind.Multiply:
      case TokenKind.Divide:
      case TokenKind.Modulo: return 6;
      case TokenKind.Power: return 7;
      default: return 0;
    }
  }

  private tokenToBinaryOp(token: Token): BinaryOp {
    switch (token.kind) {
      case TokenKind.Plus: return "+";
      case TokenKind.Minus: return "-";
      case TokenKind.Multiply: return "*";
      case TokenKind.Divide: return "/";
      case TokenKind.Modulo: return "%";
      case TokenKind.Power: return "**";
      case TokenKind.Equal: return "==";
      case TokenKind.Greater: return ">";
      case TokenKind.GreaterEqual: return ">=";
      case TokenKind.Less: return "<";
      case TokenKind.LessEqual: return "<=";
      case TokenKind.And: return "and";
      case TokenKind.Or: return "or";
      default:
        return fail(unexpectedToken(token, this.filename, "a binary operator"));
    }
  }

  // ============================================================
  // Helpers
  // ============================================================

  private peek(): Token {
    return this.tokens[this.pos] ?? this.eof();
  }

  private peekNext(): Token {
    return this.tokens[this.pos + 1] ?? this.eof();
  }

  private eof(): Token {
    const last = this.tokens[this.tokens.length - 1];
    if (last && last.kind === TokenKind.EOF) return last;
    return { kind: TokenKind.EOF, lexeme: "", line: last?.line ?? 1, column: last?.column ?? 1 };
  }

  private advance(): Token {
    const tok = this.peek();
    if (!this.isAtEnd()) this.pos++;
    return tok;
  }

  private match(kind: TokenKind): boolean {
    if (this.peek().kind !== kind) return false;
    this.advance();
    return true;
  }

  private isAtEnd(): boolean {
    return this.peek().kind === TokenKind.EOF;
  }

  private isLineEnd(token: Token): boolean {
    return token.kind === TokenKind.NewLine || token.kind === TokenKind.EOF;
  }

  private expect(kind: TokenKind, expected: string): Token {
    const tok = this.peek();
    if (tok.kind === kind) return this.advance();
    return fail(unexpectedToken(tok, this.filename, expected));
  }

  private expectEndOfStatement(): void {
    const tok = this.peek();
    if (tok.kind === TokenKind.NewLine) {
      this.advance();
      return;
    }
    if (tok.kind === TokenKind.EOF) return;
    fail(unexpectedToken(tok, this.filename, "end of line after the statement"));
  }

  /** Re-raises a BrushError with extra context; anything else passes through untouched. */
  private rethrow(e: unknown, context: string, kind?: ErrorKind): never {
    if (e instanceof BrushError) throw e.withContext(context, kind);
    throw e;
  }

  /** Discards the rest of the current line, newline included. */
  private synchronize(): void {
    while (!this.isAtEnd() && this.peek().kind !== TokenKind.NewLine) {
      this.advance();
    }
    this.match(TokenKind.NewLine);
  }
}

export function parse(tokens: Token[], filename: string = "<stdin>"): { program: Program; errors: Diagnostic[] } {
  return new Parser(tokens, filename).parse();
}
