import { existsSync, readFileSync } from "node:fs";
import { createRequire } from "node:module";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import type { ErrorObject, ValidateFunction } from "ajv";

const SCHEMA_FILES = {
  imageView: "image-view.schema.json",
  acceptResponse: "accept-response.schema.json",
  stats: "stats.schema.json",
  metadata: "metadata.schema.json",
  batchReport: "batch-report.schema.json",
} as const;

export type SchemaName = keyof typeof SCHEMA_FILES;

export const SCHEMA_NAMES = Object.keys(SCHEMA_FILES) as SchemaName[];

export type SchemaViolation = { path: string; message: string };

type ValidateResult = { ok: true } | { ok: false; errors: SchemaViolation[] };

type SchemaRegistry = {
  addSchema(schema: unknown, key: string): unknown;
  getSchema(key: string): ValidateFunction | undefined;
};

const require = createRequire(import.meta.url);
const Ajv2020 = require("ajv/dist/2020").default as new (options: Record<string, unknown>) => SchemaRegistry;
const addFormats = require("ajv-formats").default as (registry: SchemaRegistry) => void;

/** Thrown by `ensureSchema`; carries every violation found. */
export class ContractViolationError extends Error {
  constructor(
    readonly schema: SchemaName,
    readonly violations: SchemaViolation[],
  ) {
    super(`Schema validation failed for ${schema}: ${violations.map((v) => `${v.path} ${v.message}`).join("; ")}`);
    this.name = "ContractViolationError";
  }
}

/** Nearest `docs/contracts/schemas` at or above `fromDir`. */
export function findSchemaDirectory(fromDir: string): string {
  for (let dir = fromDir; ; dir = dirname(dir)) {
    const candidate = join(dir, "docs", "contracts", "schemas");
    if (existsSync(candidate)) return candidate;
    if (dirname(dir) === dir) {
      throw new Error(`No docs/contracts/schemas directory above ${fromDir}`);
    }
  }
}

/**
 * Registers every contract with one Ajv 2020 instance, keyed by name.
 * Ajv compiles each schema on first lookup and keeps the result.
 */
export function createContractRegistry(schemaDir: string) {
  const registry = new Ajv2020({ allErrors: true, strict: false });
  addFormats(registry);
  for (const name of SCHEMA_NAMES) {
    registry.addSchema(JSON.parse(readFileSync(join(schemaDir, SCHEMA_FILES[name]), "utf-8")), name);
  }

  function validator(name: SchemaName): ValidateFunction {
    const compiled = registry.getSchema(name);
    if (!compiled) throw new Error(`Schema not registered: ${name}`);
    return compiled;
  }

  function violations(errors: ErrorObject[] | null | undefined): SchemaViolation[] {
    return (errors ?? []).map(({ instancePath, message }) => ({
      path: instancePath || "/",
      message: message ?? "Invalid value",
    }));
  }

  function validate(name: SchemaName, payload: unknown): ValidateResult {
    const check = validator(name);
    return check(payload) ? { ok: true } : { ok: false, errors: violations(check.errors) };
  }

  function ensure<T>(name: SchemaName, payload: T): T {
    const result = validate(name, payload);
    if (!result.ok) throw new ContractViolationError(name, result.errors);
    return payload;
  }

  return { validate, ensure };
}

export type ContractRegistry = ReturnType<typeof createContractRegistry>;

let shared: ContractRegistry | undefined;

function contracts(): ContractRegistry {
  shared ??= createContractRegistry(findSchemaDirectory(dirname(fileURLToPath(import.meta.url))));
  return shared;
}

export function validateSchema(name: SchemaName, payload: unknown): ValidateResult {
  return contracts().validate(name, payload);
}

/** Returns `payload` unchanged, or throws `ContractViolationError`. */
export function ensureSchema<T>(name: SchemaName, payload: T): T {
  return contracts().ensure(name, payload);
}
