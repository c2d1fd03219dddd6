import chalk from "chalk";
import type { Diagnostic } from "./diagnostic.js";

export function formatDiagnostic(diag: Diagnostic): string {
  const severityLabel =
    diag.severity === "error" ? chalk.red.bold("error") : chalk.yellow.bold("warning");

  let output = `${severityLabel}: ${chalk.bold(diag.message)}\n`;
  output += `  ${chalk.blue("-->")} ${diag.option}`;
  if (diag.value !== undefined) {
    output += ` ${chalk.blue("|")} ${JSON.stringify(diag.value)}`;
  }
  output += "\n";

  if (diag.help) {
    output += `  ${chalk.blue("=")} ${chalk.green("help")}: ${diag.help}\n`;
  }

  return output;
}

export function formatDiagnostics(diagnostics: Diagnostic[]): string {
  return diagnostics.map((d) => formatDiagnostic(d)).join("\n");
}
