import Ajv2020 from "ajv/dist/2020.js";
import addFormats from "ajv-formats";

export type AjvError = { instancePath: string; message?: string; params: Record<string, unknown> };

export type AjvValidateFn<T> = ((data: unknown) => data is T) & { errors?: AjvError[] | null };

export type AjvInstance = {
  compile: <T>(schema: object) => AjvValidateFn<T>;
  errorsText: (errors?: AjvError[] | null) => string;
};

/**
 * Ajv 2020 with formats. Defaults are written into the validated object and
 * scalar strings are coerced, so values from environment overrides validate
 * as numbers and booleans.
 */
export function loadAjv(): AjvInstance {
  const AjvCtor = Ajv2020 as unknown as { new (opts: unknown): AjvInstance };
  const add = addFormats as unknown as (ajv: AjvInstance) => void;

  const ajv = new AjvCtor({ allErrors: true, strict: true, useDefaults: true, coerceTypes: true });
  add(ajv);

  return ajv;
}
