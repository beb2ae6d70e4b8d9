import { isAbsolute, relative } from "node:path";
import type { Diagnostic, DiagnosticSeverity } from "@semir/compiler";

type Position = { line: number; column: number };

const positionAt = (source: string, index: number): Position => {
  const before = source.slice(0, Math.max(0, Math.min(index, source.length)));
  const lines = before.split("\n");
  return { line: lines.length, column: (lines.at(-1)?.length ?? 0) + 1 };
};

const colorForSeverity = (severity: DiagnosticSeverity): string => {
  switch (severity) {
    case "warning":
      return "33";
    case "note":
      return "36";
    default:
      return "31";
  }
};

const paint = (enabled: boolean, code: string, text: string): string =>
  enabled ? `\u001B[${code}m${text}\u001B[0m` : text;

const displayPath = (file: string): string =>
  isAbsolute(file) ? relative(process.cwd(), file) || file : file;

/**
 * Formats a diagnostic for the terminal. When the program source is given,
 * the location is shown as line and column and the offending line is quoted.
 */
export const formatCliDiagnostic = (
  diagnostic: Diagnostic,
  { source, color = true }: { source?: string; color?: boolean } = {},
): string => {
  const { span } = diagnostic;
  const position = source ? positionAt(source, span.start) : undefined;
  const location = position
    ? `${displayPath(span.file)}:${position.line}:${position.column}`
    : `${displayPath(span.file)}:${span.start}-${span.end}`;
  const severity = paint(
    color,
    `1;${colorForSeverity(diagnostic.severity)}`,
    diagnostic.severity.toUpperCase(),
  );
  const phase = diagnostic.phase ? ` [${diagnostic.phase}]` : "";
  const header = `${location} ${severity}${phase} ${paint(color, "35", diagnostic.code)}: ${diagnostic.message}`;

  const lineText = position && source?.split("\n")[position.line - 1];
  if (!position || !lineText) {
    return header;
  }
  const gutter = `${position.line}`;
  const padding = " ".repeat(gutter.length);
  const width = Math.max(1, Math.min(span.end - span.start, lineText.length - position.column + 1));
  const marker = `${" ".repeat(position.column - 1)}${paint(
    color,
    colorForSeverity(diagnostic.severity),
    "^".repeat(width),
  )}`;
  const hints = (diagnostic.hints ?? []).map((hint) => `${padding} = hint: ${hint.message}`);

  return [header, `${padding} |`, `${gutter} | ${lineText}`, `${padding} | ${marker}`, ...hints].join(
    "\n",
  );
};
