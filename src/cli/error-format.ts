/*
Purpose: render CLI errors and warnings for the terminal, colored only on a TTY.
Assumptions: errors and warnings go to stderr; info lines go to stdout uncolored.
Usage: console.error(renderCliError(err, { debug })); createCliReporter().warn("...").
*/

import {
  formatErrorLines,
  type ErrorFormatLine,
  type ErrorFormatLineKind,
} from "../core/error-format.js";
import type { LaunchReporter } from "../launch/ports.js";

// =============================================================================
// TYPES
// =============================================================================

export type CliOutputOptions = {
  debug?: boolean;
  useColor?: boolean;
  stream?: { isTTY?: boolean };
};

type AnsiStyle = "bold" | "dim" | "red" | "yellow";

type AnsiFormatter = (value: string, styles: AnsiStyle[]) => string;

type LineStyle = {
  label?: string;
  labelStyles: AnsiStyle[];
  textStyles: AnsiStyle[];
  block?: boolean;
};

const LINE_STYLES: Record<ErrorFormatLineKind, LineStyle> = {
  title: { label: "Error:", labelStyles: ["red", "bold"], textStyles: ["bold"] },
  message: { labelStyles: [], textStyles: [] },
  hint: { label: "Hint:", labelStyles: ["yellow"], textStyles: [] },
  code: { label: "Code:", labelStyles: ["dim"], textStyles: ["dim"] },
  name: { label: "Name:", labelStyles: ["dim"], textStyles: ["dim"] },
  cause: { label: "Cause:", labelStyles: ["dim"], textStyles: ["dim"] },
  stack: { label: "Stack:", labelStyles: ["dim"], textStyles: ["dim"], block: true },
};

// =============================================================================
// OUTPUT
// =============================================================================

export function renderCliError(error: unknown, options: CliOutputOptions = {}): string {
  const format = resolveFormatter(options);

  return formatErrorLines(error, { mode: options.debug ? "debug" : "short" })
    .map((line) => renderLine(line, format))
    .join("\n");
}

export function renderCliWarning(message: string, options: CliOutputOptions = {}): string {
  const format = resolveFormatter(options);
  return `${format("Warning:", ["yellow", "bold"])} ${message}`;
}

export function createCliReporter(options: Omit<CliOutputOptions, "debug"> = {}): LaunchReporter {
  return {
    info: (message) => console.log(message),
    warn: (message) => console.warn(renderCliWarning(message, options)),
  };
}

// =============================================================================
// INTERNALS
// =============================================================================

const ANSI_CODES: Record<AnsiStyle, string> = {
  bold: "\x1b[1m",
  dim: "\x1b[2m",
  red: "\x1b[31m",
  yellow: "\x1b[33m",
};

// Color only reaches a TTY; useColor can turn it off but never force it on.
function resolveFormatter(options: CliOutputOptions): AnsiFormatter {
  const stream = options.stream ?? process.stderr;
  const enabled = Boolean(stream.isTTY) && options.useColor !== false;

  return (value, styles) => {
    if (!enabled || styles.length === 0) return value;
    return `${styles.map((style) => ANSI_CODES[style]).join("")}${value}\x1b[0m`;
  };
}

function renderLine(line: ErrorFormatLine, format: AnsiFormatter): string {
  const style = LINE_STYLES[line.kind];
  if (!style.label) {
    return format(line.text, style.textStyles);
  }

  const label = format(style.label, style.labelStyles);
  if (style.block) {
    return `${label}\n${format(indentMultiline(line.text, 2), style.textStyles)}`;
  }

  return `${label} ${format(line.text, style.textStyles)}`;
}

function indentMultiline(value: string, spaces: number): string {
  const prefix = " ".repeat(Math.max(0, spaces));
  return value
    .split("\n")
    .map((line) => `${prefix}${line}`)
    .join("\n");
}
