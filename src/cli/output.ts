import {
  createAnsiFormatter,
  formatErrorLines,
  resolveColorEnabled,
  type AnsiFormatter,
  type ErrorFormatLine,
} from "../core/error-format.js";
import type { UserFacingError } from "../core/errors.js";
import type { ReloadOutcome } from "../app/reload.js";

export type CliOutputOptions = {
  debug?: boolean;
  color?: boolean;
};

export function printError(error: unknown, opts: CliOutputOptions = {}): void {
  const format = createAnsiFormatter(
    resolveColorEnabled({ stream: process.stderr, useColor: opts.color }),
  );
  const lines = formatErrorLines(error, { mode: opts.debug ? "debug" : "short" });
  for (const line of lines) {
    console.error(renderLine(line, format));
  }
}

export function printWarning(error: UserFacingError, opts: CliOutputOptions = {}): void {
  const format = createAnsiFormatter(
    resolveColorEnabled({ stream: process.stderr, useColor: opts.color }),
  );
  const lines = formatErrorLines(error, { mode: opts.debug ? "debug" : "short" });
  for (const line of lines) {
    if (line.kind === "title") {
      console.error(format(`Warning: ${line.text}`, ["bold", "yellow"]));
      continue;
    }
    console.error(renderLine(line, format));
  }
}

export function printReloadOutcome(
  outcome: ReloadOutcome | null,
  opts: CliOutputOptions = {},
): void {
  if (!outcome) return;
  if (outcome.status === "sent") {
    console.log("Proxy reload requested.");
    return;
  }
  printWarning(outcome.error, opts);
}

function renderLine(line: ErrorFormatLine, format: AnsiFormatter): string {
  switch (line.kind) {
    case "title":
      return format(`Error: ${line.text}`, ["bold", "red"]);
    case "message":
      return line.text;
    case "hint":
      return format(`Hint: ${line.text}`, ["cyan"]);
    case "next":
      return format(`Next: ${line.text}`, ["cyan"]);
    case "code":
      return format(`Code: ${line.text}`, ["dim"]);
    case "name":
      return format(`Name: ${line.text}`, ["dim"]);
    case "cause":
      return format(`Cause: ${line.text}`, ["dim"]);
    case "stack":
      return format(line.text, ["dim"]);
  }
}
