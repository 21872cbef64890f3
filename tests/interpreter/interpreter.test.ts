import { describe, it, expect, vi } from "vitest";
import { tokenize } from "../../src/lexer/lexer.js";
import { parse } from "../../src/parser/parser.js";
import { Interpreter, type InterpreterOptions } from "../../src/interpreter/interpreter.js";
import { Canvas } from "../../src/canvas/canvas.js";
import { NAMED_COLORS } from "../../src/canvas/colors.js";
import { BrushError } from "../../src/errors/diagnostic.js";
import type { Program } from "../../src/ast/nodes.js";

function compile(source: string): Program {
  const { program, errors } = parse(tokenize(source, "test.brush"), "test.brush");
  if (errors.length > 0) throw new Error(errors.map((e) => e.message).join("; "));
  return program;
}

function exec(source: string, options: InterpreterOptions = {}, canvas = new Canvas(32)) {
  const interpreter = new Interpreter({ filename: "test.brush", ...options });
  const state = interpreter.execute(compile(source), canvas);
  return { state, canvas, interpreter, vars: interpreter.getVariables() };
}

function runtimeError(source: string, options: InterpreterOptions = {}, canvas = new Canvas(32)): BrushError {
  try {
    exec(source, options, canvas);
  } catch (e) {
    if (e instanceof BrushError) return e;
    throw e;
  }
  throw new Error("expected the program to fail");
}

function color(name: string): number {
  const value = NAMED_COLORS.get(name);
  if (value === undefined) throw new Error(`no colour ${name}`);
  return value;
}

describe("Interpreter", () => {
  describe("expressions", () => {
    it("uses truncating 32-bit integer arithmetic", () => {
      const { vars } = exec([
        "a <- 7 / 2",
        "b <- -7 / 2",
        "c <- -7 % 3",
        "d <- 2 ** 10",
        "e <- 2 ** -1",
        "f <- 2147483647 + 1",
        "g <- 10 - 3 - 2",
        "h <- 65536 * 65536",
      ].join("\n"));
      expect(vars.get("a")).toEqual({ tag: "Int", value: 3 });
      expect(vars.get("b")).toEqual({ tag: "Int", value: -3 });
      expect(vars.get("c")).toEqual({ tag: "Int", value: -1 });
      expect(vars.get("d")).toEqual({ tag: "Int", value: 1024 });
      expect(vars.get("e")).toEqual({ tag: "Int", value: 0 });
      expect(vars.get("f")).toEqual({ tag: "Int", value: -2147483648 });
      expect(vars.get("g")).toEqual({ tag: "Int", value: 5 });
      expect(vars.get("h")).toEqual({ tag: "Int", value: 0 });
    });

    it("compares integers and strings and combines booleans", () => {
      const { vars } = exec([
        "p <- 3 > 2",
        "q <- \"abc\" < \"abd\"",
        "r <- 1 == 1 and 2 == 3",
        "s <- 1 == 2 or 2 == 2",
        "t <- \"Red\" == \"Red\"",
      ].join("\n"));
      expect(vars.get("p")).toEqual({ tag: "Bool", value: true });
      expect(vars.get("q")).toEqual({ tag: "Bool", value: true });
      expect(vars.get("r")).toEqual({ tag: "Bool", value: false });
      expect(vars.get("s")).toEqual({ tag: "Bool", value: true });
      expect(vars.get("t")).toEqual({ tag: "Bool", value: true });
    });

    it("reaches the most negative Int through unary minus", () => {
      const { vars } = exec("x <- -2147483648\ny <- x / 2");
      expect(vars.get("x")).toEqual({ tag: "Int", value: -2147483648 });
      expect(vars.get("y")).toEqual({ tag: "Int", value: -1073741824 });
    });

    it("evaluates the same expression to the same value", () => {
      const { vars } = exec("x <- (3 * 4 - 2) ** 2 % 7\ny <- (3 * 4 - 2) ** 2 % 7");
      expect(vars.get("x")).toEqual({ tag: "Int", value: 2 });
      expect(vars.get("y")).toEqual(vars.get("x"));
    });

    it("rejects operands of the wrong type", () => {
      const err = runtimeError("x <- 1 + \"a\"");
      expect(err.kind).toBe("execution");
      expect(err.line).toBe(1);
      expect(err.diagnostic.message).toBe("Operator '+' expects Int operands, got Int and String");
      expect(runtimeError("x <- 1 == \"a\"").diagnostic.message).toBe(
        "Operator '==' expects operands of the same type, got Int and String",
      );
      expect(runtimeError("x <- 1 and 2").diagnostic.message).toBe(
        "Operator 'and' expects Bool operands, got Int and Int",
      );
    });

    it("fails on division and modulo by zero", () => {
      expect(runtimeError("x <- 1 / 0").diagnostic.message).toBe("Division by zero");
      const err = runtimeError("Spawn(0, 0)\nx <- 5 % 0");
      expect(err.kind).toBe("execution");
      expect(err.diagnostic.message).toBe("Modulo by zero");
      expect(err.line).toBe(2);
    });

    it("fails on undefined variables", () => {
      const err = runtimeError("x <- y + 1");
      expect(err.kind).toBe("semantic");
      expect(err.diagnostic.message).toBe("Undefined variable 'y'");
      expect(err.diagnostic.source).toBe("test.brush");
    });

    it("binds undefined variables to 0 with a warning in lenient mode", () => {
      const { vars, interpreter } = exec("x <- y + 1", { lenientVariables: true });
      expect(vars.get("x")).toEqual({ tag: "Int", value: 1 });
      const warnings = interpreter.getWarnings();
      expect(warnings).toHaveLength(1);
      expect(warnings[0].severity).toBe("warning");
      expect(warnings[0].message).toBe("Variable 'y' used before assignment; initialised to 0");
      expect(warnings[0].line).toBe(1);
    });
  });

  describe("commands", () => {
    it("spawns the agent", () => {
      const { state } = exec("Spawn(3, 4)");
      expect(state).toEqual({ position: { x: 3, y: 4 }, brushColor: color("Transparent"), brushSize: 1, spawned: true });
    });

    it("refuses a second Spawn anywhere in the run", () => {
      const err = runtimeError("Spawn(1, 1)\nn <- 1\nSpawn(2, 2)");
      expect(err.kind).toBe("semantic");
      expect(err.line).toBe(3);
      expect(err.diagnostic.message).toBe("Spawn can only be called once per program");
    });

    it("refuses to spawn off the canvas", () => {
      const err = runtimeError("Spawn(32, 0)");
      expect(err.kind).toBe("execution");
      expect(err.diagnostic.message).toBe("Spawn position (32, 0) is outside the 32x32 canvas");
    });

    it("rounds even brush sizes down to odd", () => {
      for (const n of [2, 4, 10, 100]) {
        expect(exec(`Size(${n})`).state.brushSize).toBe(n - 1);
      }
      expect(exec("Size(5)").state.brushSize).toBe(5);
    });

    it("rejects non-positive brush sizes", () => {
      expect(runtimeError("Size(0)").kind).toBe("semantic");
      expect(runtimeError("Size(-2)").diagnostic.message).toBe("Brush size must be positive, got -2");
    });

    it("sets the brush colour by name or hex", () => {
      expect(exec("Color(\"Red\")").state.brushColor).toBe(color("Red"));
      expect(exec("Color(\"#00ff00\")").state.brushColor).toBe(0x00ff00ff);
    });

    it("rejects unknown colour names", () => {
      const err = runtimeError("Color(\"Magenta\")");
      expect(err.kind).toBe("semantic");
      expect(err.diagnostic.message).toBe("Unknown color 'Magenta'");
      expect(err.diagnostic.context).toBe("Color, argument 1");
    });

    it("rejects arguments of the wrong type", () => {
      const err = runtimeError("Color(3)");
      expect(err.kind).toBe("execution");
      expect(err.diagnostic.message).toBe("Color expects String for 'color', got Int");
      expect(err.diagnostic.context).toBe("argument 1");
    });

    it("checks arity", () => {
      const err = runtimeError("Spawn(0, 0)\nFill(1)");
      expect(err.kind).toBe("syntax");
      expect(err.line).toBe(2);
      expect(err.diagnostic.message).toBe("Fill takes 0 arguments, got 1");
      expect(err.diagnostic.context).toBe("no arguments");
    });

    it("draws a line and moves the agent to its end", () => {
      const { state, canvas } = exec("Spawn(0, 0)\nColor(\"Black\")\nDrawLine(1, 0, 10)", {}, new Canvas(200));
      expect(state.position).toEqual({ x: 10, y: 0 });
      expect(canvas.countColorInBox(color("Black"), { x: 0, y: 0 }, { x: 199, y: 199 })).toBe(11);
      for (let x = 0; x <= 10; x++) expect(canvas.colorAt(x, 0)).toBe(color("Black"));
    });

    it("clamps directions to -1..1", () => {
      expect(exec("Spawn(5, 5)\nDrawLine(5, -3, 2)").state.position).toEqual({ x: 7, y: 3 });
    });

    it("refuses to draw a line that ends off the canvas", () => {
      const err = runtimeError("Spawn(30, 0)\nDrawLine(1, 0, 5)");
      expect(err.kind).toBe("execution");
      expect(err.line).toBe(2);
      expect(err.diagnostic.message).toBe("Line end (35, 0) is outside the 32x32 canvas");
    });

    it("draws a circle around the moved agent", () => {
      const { state, canvas } = exec("Spawn(10, 10)\nColor(\"Red\")\nDrawCircle(0, 1, 5)");
      expect(state.position).toEqual({ x: 10, y: 15 });
      expect(canvas.colorAt(10, 20)).toBe(color("Red"));
      expect(canvas.colorAt(10, 15)).toBe(color("White"));
    });

    it("moves backwards and draws nothing for a negative radius", () => {
      const { state, canvas } = exec("Spawn(10, 10)\nColor(\"Red\")\nDrawCircle(1, 0, -3)");
      expect(state.position).toEqual({ x: 7, y: 10 });
      expect(canvas.countColorInBox(color("Red"), { x: 0, y: 0 }, { x: 31, y: 31 })).toBe(0);
    });

    it("finishes a huge rectangle on a small canvas", () => {
      const { state, canvas } = exec(
        "Spawn(0, 0)\nColor(\"Red\")\nSize(99)\nDrawRectangle(0, 0, 0, 2000000000, 2000000000)",
        {},
        new Canvas(16),
      );
      expect(state.position).toEqual({ x: 0, y: 0 });
      expect(canvas.countColorInBox(color("Red"), { x: 0, y: 0 }, { x: 15, y: 15 })).toBe(0);
    });

    it("draws a rectangle border around the moved agent", () => {
      const { state, canvas } = exec("Spawn(10, 10)\nColor(\"Blue\")\nDrawRectangle(1, 0, 5, 4, 2)");
      expect(state.position).toEqual({ x: 15, y: 10 });
      expect(canvas.colorAt(13, 9)).toBe(color("Blue"));
      expect(canvas.colorAt(17, 11)).toBe(color("Blue"));
      expect(canvas.colorAt(15, 10)).toBe(color("White"));
    });

    it("fills the whole blank canvas", () => {
      const { canvas } = exec("Spawn(0, 0)\nColor(\"Green\")\nFill()", {}, new Canvas(16));
      expect(canvas.countColorInBox(color("Green"), { x: 0, y: 0 }, { x: 15, y: 15 })).toBe(256);
    });

    it("fills only inside an enclosing border", () => {
      const source = [
        "Spawn(10, 10)",
        "Color(\"Blue\")",
        "DrawRectangle(0, 0, 0, 6, 6)",
        "Color(\"Red\")",
        "Fill()",
      ].join("\n");
      const { canvas } = exec(source);
      expect(canvas.countColorInBox(color("Red"), { x: 0, y: 0 }, { x: 31, y: 31 })).toBe(25);
      expect(canvas.colorAt(0, 0)).toBe(color("White"));
    });

    it("refuses to fill before Spawn", () => {
      const err = runtimeError("Color(\"Red\")\nFill()");
      expect(err.kind).toBe("semantic");
      expect(err.line).toBe(2);
    });
  });

  describe("query functions", () => {
    it("reports the agent position and canvas size", () => {
      const { vars } = exec("Spawn(3, 4)\nx <- GetActualX()\ny <- GetActualY()\ns <- GetCanvasSize()");
      expect(vars.get("x")).toEqual({ tag: "Int", value: 3 });
      expect(vars.get("y")).toEqual({ tag: "Int", value: 4 });
      expect(vars.get("s")).toEqual({ tag: "Int", value: 32 });
    });

    it("counts colours in a box on a fresh canvas", () => {
      const { vars } = exec("c <- GetColorCount(\"White\", 0, 0, 9, 9)", {}, new Canvas(200));
      expect(vars.get("c")).toEqual({ tag: "Int", value: 100 });
    });

    it("answers brush queries with 1 or 0", () => {
      const { vars } = exec("a <- IsBrushColor(\"Transparent\")\nb <- IsBrushSize(1)\nc <- IsBrushSize(3)");
      expect(vars.get("a")).toEqual({ tag: "Int", value: 1 });
      expect(vars.get("b")).toEqual({ tag: "Int", value: 1 });
      expect(vars.get("c")).toEqual({ tag: "Int", value: 0 });
    });

    it("probes canvas pixels relative to the agent", () => {
      const source = [
        "Spawn(5, 5)",
        "Color(\"Red\")",
        "DrawLine(1, 0, 2)",
        "k <- IsCanvasColor(\"Red\", 0, -1)",
        "m <- IsCanvasColor(\"Red\", 1, 0)",
      ].join("\n");
      const { vars } = exec(source);
      expect(vars.get("k")).toEqual({ tag: "Int", value: 1 });
      expect(vars.get("m")).toEqual({ tag: "Int", value: 0 });
    });

    it("fails when a canvas probe leaves the grid", () => {
      const err = runtimeError("Spawn(0, 0)\nk <- IsCanvasColor(\"Red\", -1, 0)");
      expect(err.kind).toBe("execution");
      expect(err.line).toBe(2);
      expect(err.diagnostic.message).toBe("IsCanvasColor position (0, -1) is outside the 32x32 canvas");
    });

    it("rejects unknown functions and wrong arity", () => {
      const unknown = runtimeError("x <- Foo(1)");
      expect(unknown.kind).toBe("semantic");
      expect(unknown.diagnostic.message).toBe("Unknown function 'Foo'");
      const arity = runtimeError("x <- GetActualX(1)");
      expect(arity.kind).toBe("syntax");
      expect(arity.diagnostic.message).toBe("GetActualX takes 0 arguments, got 1");
    });
  });

  describe("labels and jumps", () => {
    it("loops backwards to a label", () => {
      const { vars } = exec("n <- 0\ntop\nn <- n + 1\nGoTo[top](n < 5)");
      expect(vars.get("n")).toEqual({ tag: "Int", value: 5 });
    });

    it("jumps forward past statements", () => {
      const { state } = exec("GoTo[end](1 == 1)\nSpawn(40, 40)\nend");
      expect(state.spawned).toBe(false);
    });

    it("reports an undefined label only when the jump is taken", () => {
      expect(() => exec("n <- 1\nGoTo[nowhere](n == 2)\nm <- 3")).not.toThrow();
      const err = runtimeError("n <- 1\nGoTo[nowhere](n == 1)");
      expect(err.kind).toBe("semantic");
      expect(err.line).toBe(2);
      expect(err.diagnostic.message).toBe("Undefined label 'nowhere'");
    });

    it("treats labels case-sensitively", () => {
      expect(runtimeError("Top\nGoTo[top](1 == 1)").diagnostic.message).toBe("Undefined label 'top'");
    });

    it("rejects duplicate labels before running anything", () => {
      const canvas = new Canvas(16);
      const err = runtimeError("Spawn(0, 0)\nColor(\"Red\")\nFill()\na\nb\na", {}, canvas);
      expect(err.kind).toBe("semantic");
      expect(err.line).toBe(6);
      expect(err.diagnostic.message).toBe("Duplicate label 'a'");
      expect(canvas.colorAt(0, 0)).toBe(color("White"));
    });

    it("requires a Bool condition", () => {
      const err = runtimeError("top\nGoTo[top](1)");
      expect(err.kind).toBe("execution");
      expect(err.diagnostic.message).toBe("GoTo condition must be Bool, got Int");
    });

    it("draws one shrinking circle per loop iteration", () => {
      const canvas = new Canvas(400);
      const drawCircle = vi.spyOn(canvas, "drawCircle");
      const source = [
        "Spawn(0, 0)",
        "radio <- 50",
        "loop",
        "DrawCircle(1, 1, radio)",
        "radio <- radio - 5",
        "GoTo[loop](radio > 10)",
      ].join("\n");
      const { state } = exec(source, {}, canvas);
      expect(drawCircle.mock.calls.map((call) => call[1])).toEqual([50, 45, 40, 35, 30, 25, 20, 15]);
      expect(state.position).toEqual({ x: 260, y: 260 });
    });
  });

  describe("runs", () => {
    it("calls the trace hook before each statement", () => {
      const pcs: number[] = [];
      exec("n <- 0\ntop\nn <- n + 1\nGoTo[top](n < 2)", { trace: (event) => pcs.push(event.pc) });
      expect(pcs).toEqual([0, 1, 2, 3, 1, 2, 3]);
    });

    it("resets all state between runs", () => {
      const interpreter = new Interpreter();
      const canvas = new Canvas(16);
      interpreter.execute(compile("Spawn(1, 1)\nx <- 1\nSize(3)"), canvas);
      const state = interpreter.execute(compile("Spawn(2, 2)"), canvas);
      expect(state).toMatchObject({ position: { x: 2, y: 2 }, brushSize: 1 });
      expect(() => interpreter.execute(compile("y <- x"), canvas)).toThrow("Undefined variable 'x'");
    });
  });
});
