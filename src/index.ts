#!/usr/bin/env node
import { Command } from "commander";
import chalk from "chalk";
import { readFile, readdir, writeFile } from "node:fs/promises";
import path from "node:path";
import { run, type RunResult } from "./runner.js";
import { Canvas } from "./canvas/canvas.js";
import { colorName } from "./canvas/colors.js";
import { encodePpm } from "./canvas/ppm.js";
import { formatDiagnostics } from "./errors/reporter.js";
import { COMMANDS, FUNCTIONS, getColorNames, signature } from "./registry/builtins-registry.js";
import { resolveCanvasSize, resolveLenient } from "./config.js";
import type { TraceEvent } from "./interpreter/interpreter.js";

const VERSION = "0.4.0";

async function resolveDefaultFile(file: string | undefined): Promise<string> {
  if (file) return file;
  const entries = await readdir(process.cwd());
  const found = entries.filter(f => f.endsWith(".brush"));
  if (found.length === 0) {
    throw new Error("No .brush file found in the current directory. Pass a file path explicitly.");
  }
  if (found.length > 1) {
    throw new Error(`Multiple .brush files found: ${found.join(", ")}. Pass a file path explicitly.`);
  }
  return path.join(process.cwd(), found[0]);
}

function printTrace(event: TraceEvent): void {
  console.log(chalk.dim(`[${event.pc}] line ${event.statement.line}: ${event.statement.kind}`));
}

function reportAndExit(source: string, result: RunResult): void {
  if (result.warnings.length > 0) {
    console.error(formatDiagnostics(source, result.warnings));
  }
  if (result.errors.length > 0) {
    console.error(formatDiagnostics(source, result.errors));
    process.exit(1);
  }
}

const program = new Command()
  .name("brushbot")
  .description("Run brushbot drawing programs on a square pixel canvas")
  .version(VERSION);

program
  .command("run [file]")
  .description("Execute a .brush program (defaults to the single .brush file in the current directory)")
  .option("-s, --size <n>", "Canvas side length, 16-1024 (default: BRUSHBOT_CANVAS_SIZE or 200)")
  .option("-o, --output <file>", "Write the final canvas as a binary PPM image")
  .option("--lenient", "Treat unassigned variables as 0 instead of failing (or BRUSHBOT_LENIENT=1)")
  .option("--no-spawn-check", "Allow programs that do not start with Spawn")
  .option("--trace", "Print every statement as it executes")
  .option("--emit-tokens", "Print the token stream and stop")
  .option("--emit-ast", "Print the AST as JSON and stop")
  .action(async (file: string | undefined, opts: Record<string, unknown>) => {
    try {
      file = await resolveDefaultFile(file);
      const source = await readFile(file, "utf-8");
      const size = resolveCanvasSize(typeof opts.size === "string" ? opts.size : undefined);
      const canvas = new Canvas(size);
      const stopEarly = !!opts.emitTokens || !!opts.emitAst;

      const result = run(source, canvas, {
        filename: file,
        checkOnly: stopEarly,
        lenientVariables: resolveLenient(!!opts.lenient),
        requireSpawnFirst: !stopEarly && opts.spawnCheck !== false,
        trace: opts.trace ? printTrace : undefined,
      });
      reportAndExit(source, result);

      if (opts.emitTokens && result.tokens) {
        for (const tok of result.tokens) {
          console.log(`${tok.kind}\t${JSON.stringify(tok.lexeme)}\t${tok.line}:${tok.column}`);
        }
        return;
      }

      if (opts.emitAst && result.program) {
        console.log(JSON.stringify(result.program, null, 2));
        return;
      }

      if (result.state) {
        const { position, brushColor, brushSize } = result.state;
        console.log(
          `Finished ${file}: agent at (${position.x}, ${position.y}), ` +
          `brush ${colorName(brushColor)} size ${brushSize}, canvas ${size}x${size}`,
        );
      }

      if (typeof opts.output === "string") {
        const image = encodePpm(canvas);
        await writeFile(opts.output, image);
        console.log(`Wrote ${opts.output} (${image.length} bytes)`);
      }
    } catch (e) {
      console.error(`Error: ${e instanceof Error ? e.message : String(e)}`);
      process.exit(1);
    }
  });

program
  .command("check [file]")
  .description("Lex and parse a .brush program, reporting every syntax error")
  .option("--no-spawn-check", "Allow programs that do not start with Spawn")
  .action(async (file: string | undefined, opts: Record<string, unknown>) => {
    try {
      file = await resolveDefaultFile(file);
      const source = await readFile(file, "utf-8");
      const result = run(source, new Canvas(), {
        filename: file,
        checkOnly: true,
        requireSpawnFirst: opts.spawnCheck !== false,
      });
      reportAndExit(source, result);
      console.log(`${file}: ${result.program?.statements.length ?? 0} statements, no errors`);
    } catch (e) {
      console.error(`Error: ${e instanceof Error ? e.message : String(e)}`);
      process.exit(1);
    }
  });

program
  .command("introspect")
  .description("Output the language's commands, functions and colours as JSON")
  .option("--commands", "Show only commands")
  .option("--functions", "Show only query functions")
  .option("--colors", "Show only colour names")
  .action((opts: Record<string, unknown>) => {
    const commands = COMMANDS.map((c) => ({ name: c.name, signature: signature(c), doc: c.doc }));
    const functions = FUNCTIONS.map((f) => ({ name: f.name, signature: signature(f), doc: f.doc }));
    const colors = getColorNames();

    if (opts.commands) {
      console.log(JSON.stringify({ commands }, null, 2));
    } else if (opts.functions) {
      console.log(JSON.stringify({ functions }, null, 2));
    } else if (opts.colors) {
      console.log(JSON.stringify({ colors }, null, 2));
    } else {
      console.log(JSON.stringify({ version: VERSION, commands, functions, colors }, null, 2));
    }
  });

await program.parseAsync();
