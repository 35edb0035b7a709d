import fs from "fs";
import path from "path";
import Ajv2020 from "ajv/dist/2020";
import type { AnySchema } from "ajv";
import { getSchemasRoot } from "../paths";

export type ValidationResult = { valid: boolean; errors: string[] };

let cached: { dir: string; ajv: Ajv2020 } | null = null;

function loadValidator(): Ajv2020 {
  const schemaDir = getSchemasRoot();
  if (cached && cached.dir === schemaDir) {
    return cached.ajv;
  }
  const ajv = new Ajv2020({ allErrors: true });
  const schemaFiles = fs.readdirSync(schemaDir).filter((file) => file.endsWith(".schema.json"));
  for (const file of schemaFiles) {
    const schema: AnySchema = JSON.parse(fs.readFileSync(path.join(schemaDir, file), "utf-8"));
    ajv.addSchema(schema, file);
  }
  cached = { dir: schemaDir, ajv };
  return ajv;
}

export function validateJson(schemaFile: string, data: unknown): ValidationResult {
  const ajv = loadValidator();
  const validate = ajv.getSchema(schemaFile);
  if (!validate) {
    return { valid: false, errors: [`Schema not found: ${schemaFile}`] };
  }
  const valid = validate(data);
  const errors = (validate.errors ?? []).map((error) => `${error.instancePath || "/"} ${error.message ?? "invalid"}`.trim());
  return { valid: Boolean(valid), errors };
}
