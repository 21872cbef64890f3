import { TokenKind, type CommandKind, type FunctionKind } from "./tokens.js";

// Keys are lowercase; the lexer folds identifiers before lookup.
export const KEYWORDS: Map<string, TokenKind> = new Map([
  ["spawn", TokenKind.Spawn],
  ["color", TokenKind.Color],
  ["size", TokenKind.Size],
  ["drawline", TokenKind.DrawLine],
  ["drawcircle", TokenKind.DrawCircle],
  ["drawrectangle", TokenKind.DrawRectangle],
  ["fill", TokenKind.Fill],
  ["goto", TokenKind.GoTo],
  ["getactualx", TokenKind.GetActualX],
  ["getactualy", TokenKind.GetActualY],
  ["getcanvassize", TokenKind.GetCanvasSize],
  ["getcolorcount", TokenKind.GetColorCount],
  ["isbrushcolor", TokenKind.IsBrushColor],
  ["isbrushsize", TokenKind.IsBrushSize],
  ["iscanvascolor", TokenKind.IsCanvasColor],
  ["and", TokenKind.And],
  ["or", TokenKind.Or],
]);

const COMMAND_KINDS: ReadonlySet<TokenKind> = new Set<TokenKind>([
  TokenKind.Spawn,
  TokenKind.Color,
  TokenKind.Size,
  TokenKind.DrawLine,
  TokenKind.DrawCircle,
  TokenKind.DrawRectangle,
  TokenKind.Fill,
]);

const FUNCTION_KINDS: ReadonlySet<TokenKind> = new Set<TokenKind>([
  TokenKind.GetActualX,
  TokenKind.GetActualY,
  TokenKind.GetCanvasSize,
  TokenKind.GetColorCount,
  TokenKind.IsBrushColor,
  TokenKind.IsBrushSize,
  TokenKind.IsCanvasColor,
]);

export function isCommandKind(kind: TokenKind): kind is CommandKind {
  return COMMAND_KINDS.has(kind);
}

export function isFunctionKind(kind: TokenKind): kind is FunctionKind {
  return FUNCTION_KINDS.has(kind);
}
