// =============================================================================
// Built-in Registry: commands and query functions
// =============================================================================
//
// The interpreter reads arity and parameter types from here; the CLI
// `introspect` command prints it. Adding a built-in means an entry below plus
// a handler in src/interpreter/interpreter.ts.

import { TokenKind, type CommandKind, type FunctionKind } from "../lexer/tokens.js";
import type { ValueTag } from "../interpreter/values.js";
import { NAMED_COLORS } from "../canvas/colors.js";

export interface BuiltinParam {
  name: string;
  type: ValueTag;
}

export interface BrushBuiltin<Name extends string = string> {
  /** Canonical spelling; source code may use any casing */
  name: Name;
  params: BuiltinParam[];
  /** Only query functions return a value, always an Int */
  returns?: ValueTag;
  doc: string;
}

const int = (name: string): BuiltinParam => ({ name, type: "Int" });
const str = (name: string): BuiltinParam => ({ name, type: "String" });

export const COMMANDS: BrushBuiltin<CommandKind>[] = [
  {
    name: TokenKind.Spawn,
    params: [int("x"), int("y")],
    doc: "Places the agent at (x, y). Allowed once per program, before any Fill.",
  },
  {
    name: TokenKind.Color,
    params: [str("color")],
    doc: "Sets the brush colour from a colour name or a #RRGGBB / #RRGGBBAA string.",
  },
  {
    name: TokenKind.Size,
    params: [int("n")],
    doc: "Sets the brush thickness. Must be positive; even sizes are rounded down to the odd size below.",
  },
  {
    name: TokenKind.DrawLine,
    params: [int("dirX"), int("dirY"), int("distance")],
    doc: "Draws a line of the given length in direction (dirX, dirY), each clamped to -1..1, and moves the agent to its end.",
  },
  {
    name: TokenKind.DrawCircle,
    params: [int("dirX"), int("dirY"), int("radius")],
    doc: "Moves the agent radius steps in direction (dirX, dirY) and draws a circle outline centred there.",
  },
  {
    name: TokenKind.DrawRectangle,
    params: [int("dirX"), int("dirY"), int("distance"), int("width"), int("height")],
    doc: "Moves the agent distance steps in direction (dirX, dirY) and draws a width x height rectangle border centred there.",
  },
  {
    name: TokenKind.Fill,
    params: [],
    doc: "Flood-fills the 4-connected area of the agent's pixel colour with the brush colour.",
  },
];

export const FUNCTIONS: BrushBuiltin<FunctionKind>[] = [
  {
    name: TokenKind.GetActualX,
    params: [],
    returns: "Int",
    doc: "The agent's current X coordinate.",
  },
  {
    name: TokenKind.GetActualY,
    params: [],
    returns: "Int",
    doc: "The agent's current Y coordinate.",
  },
  {
    name: TokenKind.GetCanvasSize,
    params: [],
    returns: "Int",
    doc: "The canvas side length in pixels.",
  },
  {
    name: TokenKind.GetColorCount,
    params: [str("color"), int("x1"), int("y1"), int("x2"), int("y2")],
    returns: "Int",
    doc: "Number of pixels of the colour inside the inclusive box spanned by the two corners, in any order.",
  },
  {
    name: TokenKind.IsBrushColor,
    params: [str("color")],
    returns: "Int",
    doc: "1 if the brush has the colour, else 0.",
  },
  {
    name: TokenKind.IsBrushSize,
    params: [int("n")],
    returns: "Int",
    doc: "1 if the brush size is n, else 0.",
  },
  {
    name: TokenKind.IsCanvasColor,
    params: [str("color"), int("vertical"), int("horizontal")],
    returns: "Int",
    doc: "1 if the pixel at the agent's position offset by (horizontal, vertical) has the colour, else 0.",
  },
];

const COMMAND_INDEX = new Map<string, BrushBuiltin<CommandKind>>(COMMANDS.map((c) => [c.name, c]));
const FUNCTION_INDEX = new Map<string, BrushBuiltin<FunctionKind>>(FUNCTIONS.map((f) => [f.name, f]));

export function getCommand(name: string): BrushBuiltin<CommandKind> | undefined {
  return COMMAND_INDEX.get(name);
}

export function getFunction(name: string): BrushBuiltin<FunctionKind> | undefined {
  return FUNCTION_INDEX.get(name);
}

export function getColorNames(): string[] {
  return [...NAMED_COLORS.keys()];
}

export function signature(builtin: BrushBuiltin): string {
  const params = builtin.params.map((p) => `${p.name}: ${p.type}`).join(", ");
  return builtin.returns ? `${builtin.name}(${params}) -> ${builtin.returns}` : `${builtin.name}(${params})`;
}
