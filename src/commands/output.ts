import type { Diagnostic } from "../types/diagnostic.js";

export type OutputFormat = "human" | "jsonl";

export function isOutputFormat(value: string): value is OutputFormat {
  return value === "human" || value === "jsonl";
}

/** Render diagnostics: JSON lines on stdout, or plain text with warnings and errors on stderr. */
export function createReporter(format: OutputFormat): (d: Diagnostic) => void {
  if (format === "jsonl") {
    return (d) => {
      process.stdout.write(JSON.stringify(d) + "\n");
    };
  }
  return (d) => {
    const line = d.step ? `[${d.step}] ${d.message}` : d.message;
    if (d.level === "info") console.log(line);
    else console.error(d.level === "warn" ? `warning: ${line}` : line);
  };
}
