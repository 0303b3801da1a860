import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { loadAjv, type AjvValidateFn, type AjvInstance } from "./ajv.js";

export const DEFAULT_SCHEMA_DIR = fileURLToPath(new URL("../../schemas", import.meta.url));

export type SchemaEntry = {
  name: string;
  version: string;
  filePath: string;
  schema: unknown;
};

export type SchemaCheck = { valid: boolean; errors: string | null };

/**
 * Loads the *.schema.json files shipped with the CLI and compiles validators
 * on demand.
 */
export class SchemaRegistry {
  private entries = new Map<string, SchemaEntry>();
  private validators = new Map<string, AjvValidateFn>();
  private readonly ajv: AjvInstance = loadAjv();

  constructor(private readonly schemaDir: string = DEFAULT_SCHEMA_DIR) {}

  load(): this {
    if (!fs.existsSync(this.schemaDir)) {
      throw new Error(`Schema directory not found: ${this.schemaDir}`);
    }

    for (const file of fs.readdirSync(this.schemaDir).filter((f) => f.endsWith(".schema.json"))) {
      const filePath = path.join(this.schemaDir, file);
      const schema = JSON.parse(fs.readFileSync(filePath, "utf8")) as Record<string, unknown>;
      // "harness.schema.json" → "harness"
      const name = file.replace(/\.schema\.json$/, "");
      this.entries.set(name, { name, version: extractVersion(schema) ?? "1.0.0", filePath, schema });
    }
    return this;
  }

  names(): string[] {
    return [...this.entries.keys()].sort();
  }

  version(name: string): string | undefined {
    return this.entries.get(name)?.version;
  }

  validate(name: string, data: unknown, dataVar = "data"): SchemaCheck {
    const validate = this.getValidator(name);
    const valid = validate(data);
    return { valid, errors: valid ? null : this.ajv.errorsText(validate.errors, { dataVar }) };
  }

  private getValidator(name: string): AjvValidateFn {
    const cached = this.validators.get(name);
    if (cached) return cached;

    const entry = this.entries.get(name);
    if (!entry) throw new Error(`Schema not found: ${name}`);

    const validate = this.ajv.compile(entry.schema);
    this.validators.set(name, validate);
    return validate;
  }
}

function extractVersion(schema: Record<string, unknown>): string | null {
  if (typeof schema.version === "string") return schema.version;
  if (typeof schema.$id === "string") {
    const m = /@(\d+\.\d+\.\d+)/.exec(schema.$id);
    if (m) return m[1];
  }
  return null;
}

let shared: SchemaRegistry | null = null;

/** Registry over the bundled schemas directory, loaded once per process. */
export function bundledSchemas(): SchemaRegistry {
  shared ??= new SchemaRegistry().load();
  return shared;
}
