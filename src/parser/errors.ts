import type { Diagnostic } from "../errors/diagnostic.js";
import { syntaxError } from "../errors/diagnostic.js";
import type { Token } from "../lexer/tokens.js";
import { TokenKind } from "../lexer/tokens.js";

export function describeToken(token: Token): string {
  switch (token.kind) {
    case TokenKind.NewLine: return "end of line (NewLine)";
    case TokenKind.EOF: return "end of input (EOF)";
    default: return `'${token.lexeme}' (${token.kind})`;
  }
}

export function unexpectedToken(token: Token, source: string, expected?: string, context?: string): Diagnostic {
  const msg = expected
    ? `Expected ${expected}, got ${describeToken(token)}`
    : `Unexpected token ${describeToken(token)}`;
  return syntaxError(msg, { line: token.line, column: token.column, source, context });
}

export function brushHint(token: Token): string | undefined {
  // Constructs people reach for that the language spells differently
  if (token.kind !== TokenKind.Identifier) return undefined;
  switch (token.lexeme.toLowerCase()) {
    case "if":
    case "while":
    case "for":
      return "there are no block statements; declare a label on its own line and jump back with GoTo[label](condition)";
    case "let":
    case "var":
    case "set":
      return "assign with 'name <- expression'";
    case "print":
    case "log":
      return "programs only draw; query the agent with GetActualX(), GetActualY() and friends";
  }
  return undefined;
}
