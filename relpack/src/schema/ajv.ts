import Ajv2020 from "ajv/dist/2020.js";
import addFormats from "ajv-formats";

export type AjvError = {
  instancePath: string;
  keyword: string;
  message?: string;
  params?: Record<string, unknown>;
};

export type AjvValidateFn<T = unknown> = ((data: unknown) => data is T) & { errors?: AjvError[] | null };

export type AjvInstance = {
  compile: <T = unknown>(schema: unknown) => AjvValidateFn<T>;
  errorsText: (errors: AjvError[] | null | undefined) => string;
};

let shared: AjvInstance | undefined;

export function loadAjv(): AjvInstance {
  if (shared) return shared;

  const AjvCtor = Ajv2020 as unknown as { new (opts: unknown): AjvInstance };
  const add = addFormats as unknown as (ajv: AjvInstance) => void;

  const ajv = new AjvCtor({ allErrors: true, strict: true });
  add(ajv);

  shared = ajv;
  return ajv;
}

/** JSON-pointer style location of the first error, as a dotted field name. */
export function firstErrorField(errors: AjvError[] | null | undefined): string {
  const first = errors?.[0];
  if (!first) return "(root)";
  const missing = first.keyword === "required" ? first.params?.["missingProperty"] : undefined;
  const segments = first.instancePath.split("/").filter((s) => s.length > 0);
  if (typeof missing === "string") segments.push(missing);
  return segments.length > 0 ? segments.join(".") : "(root)";
}
