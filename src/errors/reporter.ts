import chalk from "chalk";
import type { Diagnostic } from "./diagnostic.js";

export function formatDiagnostic(source: string, diag: Diagnostic): string {
  const severityLabel =
    diag.severity === "error"
      ? chalk.red.bold(`error[${diag.kind}]`)
      : chalk.yellow.bold(`warning[${diag.kind}]`);

  let output = `${severityLabel}: ${chalk.bold(diag.message)}\n`;
  if (diag.line <= 0) {
    output += `  ${chalk.blue("-->")} ${diag.source}\n`;
  } else {
    const lines = source.split("\n");
    const line = (lines[diag.line - 1] ?? "").replace(/\r$/, "");
    const lineNum = String(diag.line);
    const padding = " ".repeat(lineNum.length);
    const location = diag.column !== undefined ? `${diag.line}:${diag.column}` : `${diag.line}`;

    output += `${padding} ${chalk.blue("-->")} ${diag.source}:${location}\n`;
    output += `${padding} ${chalk.blue("|")}\n`;
    output += `${chalk.blue(lineNum)} ${chalk.blue("|")} ${line}\n`;
    if (diag.column !== undefined) {
      output += `${padding} ${chalk.blue("|")} ${" ".repeat(diag.column - 1)}${chalk.red("^")}\n`;
    }
  }

  if (diag.context) {
    output += `  ${chalk.blue("=")} ${chalk.green("context")}: ${diag.context}\n`;
  }

  return output;
}

export function formatDiagnostics(source: string, diagnostics: Diagnostic[]): string {
  return diagnostics.map((d) => formatDiagnostic(source, d)).join("\n");
}
