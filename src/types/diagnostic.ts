export type Diagnostic = {
  level: "error" | "warn" | "info";
  code: string;
  message: string;
  step?: string;
  path?: string;
  details?: Record<string, unknown>;
};

export type Environment = Record<string, string | undefined>;
