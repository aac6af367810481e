import { promises as fs } from "fs";
import path from "path";
import Ajv, { AnySchema, ValidateFunction } from "ajv";
import addFormats from "ajv-formats";
import { ConversionManifest } from "../types/conversionManifest";
import { writeJson } from "../utils/fs";

export const MANIFEST_SCHEMA_PATH = path.resolve(__dirname, "..", "..", "schemas", "conversion-manifest.schema.json");

let manifestValidator: ValidateFunction | null = null;

async function getManifestValidator(): Promise<ValidateFunction> {
  if (manifestValidator) return manifestValidator;
  const ajv = new Ajv({ allErrors: true, strict: false });
  addFormats(ajv);
  const schema: AnySchema = JSON.parse(await fs.readFile(MANIFEST_SCHEMA_PATH, "utf8"));
  manifestValidator = ajv.compile(schema);
  return manifestValidator;
}

/** Throws listing every schema violation, so a bad manifest never reaches disk. */
export async function assertValidManifest(manifest: unknown): Promise<void> {
  const validate = await getManifestValidator();
  if (validate(manifest)) return;
  const errors = (validate.errors ?? [])
    .map((error) => `${error.instancePath || "<root>"} ${error.message}`)
    .join("; ");
  throw new Error(`Conversion manifest failed schema validation: ${errors}`);
}

export async function writeConversionManifest(manifestPath: string, manifest: ConversionManifest): Promise<void> {
  await assertValidManifest(manifest);
  await writeJson(manifestPath, manifest);
}
