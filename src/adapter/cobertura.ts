import { XMLParser } from "fast-xml-parser";
import fs from "node:fs";
import { isRecord } from "../types/guards.js";

export type CoverageSummary = {
  line_rate: number;
  branch_rate: number | null;
  lines_covered: number | null;
  lines_valid: number | null;
  /** line_rate as a percentage, two decimals. */
  percent: number;
};

function toNumber(value: unknown): number | null {
  if (typeof value === "number") return Number.isFinite(value) ? value : null;
  if (typeof value === "string" && value.trim() !== "") {
    const n = Number(value);
    return Number.isFinite(n) ? n : null;
  }
  return null;
}

/**
 * Summarize a Cobertura XML report (the format coverage.py writes with `coverage xml`).
 */
export function parseCoberturaXml(xmlContent: string): CoverageSummary {
  const parser = new XMLParser({
    ignoreAttributes: false,
    attributeNamePrefix: "@_",
  });

  const parsed: unknown = parser.parse(xmlContent);
  const root = isRecord(parsed) ? parsed.coverage : undefined;
  if (!isRecord(root)) {
    throw new Error("Not a Cobertura report: missing <coverage> root element");
  }

  const lineRate = toNumber(root["@_line-rate"]);
  if (lineRate === null) {
    throw new Error("Cobertura report has no line-rate attribute");
  }

  return {
    line_rate: lineRate,
    branch_rate: toNumber(root["@_branch-rate"]),
    lines_covered: toNumber(root["@_lines-covered"]),
    lines_valid: toNumber(root["@_lines-valid"]),
    percent: Math.round(lineRate * 10000) / 100,
  };
}

/** Read a Cobertura XML file and return its summary. */
export function parseCoberturaFile(filePath: string): CoverageSummary {
  const content = fs.readFileSync(filePath, "utf8");
  return parseCoberturaXml(content);
}
