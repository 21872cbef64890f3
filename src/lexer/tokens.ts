export enum TokenKind {
  // Literals
  Number = "Number",
  String = "String",
  Identifier = "Identifier",

  // Commands
  Spawn = "Spawn",
  Color = "Color",
  Size = "Size",
  DrawLine = "DrawLine",
  DrawCircle = "DrawCircle",
  DrawRectangle = "DrawRectangle",
  Fill = "Fill",
  GoTo = "GoTo",

  // Query functions
  GetActualX = "GetActualX",
  GetActualY = "GetActualY",
  GetCanvasSize = "GetCanvasSize",
  GetColorCount = "GetColorCount",
  IsBrushColor = "IsBrushColor",
  IsBrushSize = "IsBrushSize",
  IsCanvasColor = "IsCanvasColor",

  // Logical
  And = "and",
  Or = "or",

  // Delimiters
  LParen = "(",
  RParen = ")",
  LBracket = "[",
  RBracket = "]",
  Comma = ",",

  // Operators
  Assign = "<-",
  Plus = "+",
  Minus = "-",
  Multiply = "*",
  Divide = "/",
  Power = "**",
  Modulo = "%",
  Equal = "==",
  Greater = ">",
  GreaterEqual = ">=",
  Less = "<",
  LessEqual = "<=",

  // Special
  NewLine = "NewLine",
  EOF = "EOF",
}

export type CommandKind =
  | TokenKind.Spawn
  | TokenKind.Color
  | TokenKind.Size
  | TokenKind.DrawLine
  | TokenKind.DrawCircle
  | TokenKind.DrawRectangle
  | TokenKind.Fill;

export type FunctionKind =
  | TokenKind.GetActualX
  | TokenKind.GetActualY
  | TokenKind.GetCanvasSize
  | TokenKind.GetColorCount
  | TokenKind.IsBrushColor
  | TokenKind.IsBrushSize
  | TokenKind.IsCanvasColor;

export interface Token {
  kind: TokenKind;
  /** Source text exactly as written, original casing kept. */
  lexeme: string;
  /** Only present for Number and String tokens. */
  literal?: number | string;
  line: number;
  column: number;
}
