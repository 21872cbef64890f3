import { TokenKind, type Token } from "./tokens.js";
import { KEYWORDS } from "./keywords.js";
import { fail, syntaxError } from "../errors/diagnostic.js";

const INT_MAX = 2147483647;

export class Lexer {
  private source: string;
  private filename: string;
  private pos: number = 0;
  private line: number = 1;
  private col: number = 1;
  private previous: TokenKind | undefined;

  constructor(source: string, filename: string = "<stdin>") {
    this.source = source;
    this.filename = filename;
  }

  /** Consumes the whole input; throws BrushError on the first bad character. */
  tokenize(): Token[] {
    const tokens: Token[] = [];
    while (this.pos < this.source.length) {
      this.skipWhitespace();
      if (this.pos >= this.source.length) break;
      const token = this.nextToken();
      tokens.push(token);
      this.previous = token.kind;
    }
    tokens.push(this.makeToken(TokenKind.EOF, this.pos, this.line, this.col));
    return tokens;
  }

  private nextToken(): Token {
    const ch = this.source[this.pos];

    if (ch === "\n") {
      const token = this.makeToken(TokenKind.NewLine, this.pos, this.line, this.col, undefined, 1);
      this.advance();
      return token;
    }
    if (this.isDigit(ch)) return this.readNumber();
    if (this.isAlpha(ch)) return this.readIdentOrKeyword();
    if (ch === '"') return this.readString();

    return this.readOperator();
  }

  private readNumber(): Token {
    const startPos = this.pos;
    const startLine = this.line;
    const startCol = this.col;

    while (this.pos < this.source.length && this.isDigit(this.source[this.pos])) {
      this.advance();
    }

    // 12abc, 3.5 and 7_x are all one malformed word, not a number and a name
    const next = this.source[this.pos];
    if (next !== undefined && (this.isAlpha(next) || next === "_" || next === ".")) {
      while (this.pos < this.source.length && this.isIdentPart(this.source[this.pos])) {
        this.advance();
      }
      fail(syntaxError(`Invalid identifier '${this.source.slice(startPos, this.pos)}'`, {
        line: startLine,
        column: startCol,
        source: this.filename,
        context: "identifiers must start with a letter",
      }));
    }

    const text = this.source.slice(startPos, this.pos);
    const value = Number(text);
    // -2147483648 reaches here as a minus sign followed by 2147483648
    const limit = this.previous === TokenKind.Minus ? INT_MAX + 1 : INT_MAX;
    if (value > limit) {
      fail(syntaxError(`Integer literal '${text}' is out of range`, {
        line: startLine,
        column: startCol,
        source: this.filename,
      }));
    }
    return this.makeToken(TokenKind.Number, startPos, startLine, startCol, value);
  }

  private readIdentOrKeyword(): Token {
    const startPos = this.pos;
    const startLine = this.line;
    const startCol = this.col;

    while (this.pos < this.source.length && this.isIdentPart(this.source[this.pos])) {
      this.advance();
    }

    const value = this.source.slice(startPos, this.pos);
    const keyword = KEYWORDS.get(value.toLowerCase());
    if (keyword !== undefined) {
      return this.makeToken(keyword, startPos, startLine, startCol);
    }

    return this.makeToken(TokenKind.Identifier, startPos, startLine, startCol);
  }

  private readString(): Token {
    const startPos = this.pos;
    const startLine = this.line;
    const startCol = this.col;

    this.advance(); // skip opening "

    while (this.pos < this.source.length && this.source[this.pos] !== '"') {
      if (this.source[this.pos] === "\n") {
        fail(syntaxError("String literal is not closed before the end of the line", {
          line: startLine,
          column: startCol,
          source: this.filename,
        }));
      }
      this.advance();
    }

    if (this.pos >= this.source.length) {
      fail(syntaxError("Unterminated string literal", {
        line: startLine,
        column: startCol,
        source: this.filename,
      }));
    }

    this.advance(); // skip closing "
    const value = this.source.slice(startPos + 1, this.pos - 1);
    return this.makeToken(TokenKind.String, startPos, startLine, startCol, value);
  }

  private readOperator(): Token {
    const startPos = this.pos;
    const startLine = this.line;
    const startCol = this.col;
    const ch = this.source[this.pos];
    const next = this.pos + 1 < this.source.length ? this.source[this.pos + 1] : "";

    // Two-character tokens
    switch (ch + next) {
      case "<-": return this.twoChar(TokenKind.Assign, startPos, startLine, startCol);
      case "**": return this.twoChar(TokenKind.Power, startPos, startLine, startCol);
      case "==": return this.twoChar(TokenKind.Equal, startPos, startLine, startCol);
      case ">=": return this.twoChar(TokenKind.GreaterEqual, startPos, startLine, startCol);
      case "<=": return this.twoChar(TokenKind.LessEqual, startPos, startLine, startCol);
      case "&&": return this.twoChar(TokenKind.And, startPos, startLine, startCol);
      case "||": return this.twoChar(TokenKind.Or, startPos, startLine, startCol);
    }

    // Single-character tokens
    this.advance();
    switch (ch) {
      case "(": return this.makeToken(TokenKind.LParen, startPos, startLine, startCol);
      case ")": return this.makeToken(TokenKind.RParen, startPos, startLine, startCol);
      case "[": return this.makeToken(TokenKind.LBracket, startPos, startLine, startCol);
      case "]": return this.makeToken(TokenKind.RBracket, startPos, startLine, startCol);
      case ",": return this.makeToken(TokenKind.Comma, startPos, startLine, startCol);
      case "+": return this.makeToken(TokenKind.Plus, startPos, startLine, startCol);
      case "-": return this.makeToken(TokenKind.Minus, startPos, startLine, startCol);
      case "*": return this.makeToken(TokenKind.Multiply, startPos, startLine, startCol);
      case "/": return this.makeToken(TokenKind.Divide, startPos, startLine, startCol);
      case "%": return this.makeToken(TokenKind.Modulo, startPos, startLine, startCol);
      case ">": return this.makeToken(TokenKind.Greater, startPos, startLine, startCol);
      case "<": return this.makeToken(TokenKind.Less, startPos, startLine, startCol);
    }

    const details = { line: startLine, column: startCol, source: this.filename };
    switch (ch) {
      case "=": return fail(syntaxError("Unexpected '='", { ...details, context: "use '==' to compare or '<-' to assign" }));
      case "&": return fail(syntaxError("Unexpected '&'", { ...details, context: "did you mean '&&'?" }));
      case "|": return fail(syntaxError("Unexpected '|'", { ...details, context: "did you mean '||'?" }));
    }
    return fail(syntaxError(`Unexpected character: '${ch}'`, details));
  }

  private twoChar(kind: TokenKind, startPos: number, startLine: number, startCol: number): Token {
    this.advance();
    this.advance();
    return this.makeToken(kind, startPos, startLine, startCol);
  }

  private skipWhitespace(): void {
    while (this.pos < this.source.length) {
      const ch = this.source[this.pos];
      if (ch === " " || ch === "\t" || ch === "\r") {
        this.advance();
      } else {
        break;
      }
    }
  }

  private advance(): void {
    if (this.pos < this.source.length) {
      if (this.source[this.pos] === "\n") {
        this.line++;
        this.col = 1;
      } else {
        this.col++;
      }
      this.pos++;
    }
  }

  private makeToken(
    kind: TokenKind,
    startPos: number,
    startLine: number,
    startCol: number,
    literal?: number | string,
    length?: number,
  ): Token {
    const end = length !== undefined ? startPos + length : this.pos;
    const token: Token = {
      kind,
      lexeme: this.source.slice(startPos, end),
      line: startLine,
      column: startCol,
    };
    if (literal !== undefined) token.literal = literal;
    return token;
  }

  private isDigit(ch: string): boolean {
    return ch >= "0" && ch <= "9";
  }

  private isAlpha(ch: string): boolean {
    return /\p{L}/u.test(ch);
  }

  private isIdentPart(ch: string): boolean {
    return this.isAlpha(ch) || this.isDigit(ch) || ch === "-" || ch === "_" || ch === ".";
  }
}

export function tokenize(source: string, filename: string = "<stdin>"): Token[] {
  return new Lexer(source, filename).tokenize();
}
