import { buildCli } from "./cli/index.js";
import {
  createAnsiFormatter,
  formatErrorLines,
  renderErrorLines,
  resolveColorEnabled,
} from "./core/error-format.js";

export async function main(argv: string[]): Promise<void> {
  const program = buildCli();

  try {
    await program.parseAsync(argv);
  } catch (err) {
    printError(err, argv.includes("--debug"));
    process.exitCode = 1;
  }
}

export function printError(error: unknown, debug: boolean): void {
  const format = createAnsiFormatter(resolveColorEnabled({ stream: process.stderr, env: process.env }));
  const lines = formatErrorLines(error, { mode: debug ? "debug" : "short" });
  for (const text of renderErrorLines(lines, format)) {
    console.error(text);
  }
}
