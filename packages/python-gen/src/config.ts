/**
 * Generator and CLI options, validated with zod.
 */

import { SchemaValidationError } from "@wirebind/schema";
import { z } from "zod";

export const LOG_LEVELS = ["debug", "info", "warn", "error", "silent"] as const;

const PYTHON_MODULE_PATTERN = /^\.*[A-Za-z_][A-Za-z0-9_]*(\.[A-Za-z_][A-Za-z0-9_]*)*$/;

export const generatorOptionsSchema = z.object({
  /** Python module providing `c_uint128`, `dataclass`, `validate_uint` and the library handle. */
  runtimeModule: z
    .string()
    .regex(PYTHON_MODULE_PATTERN, "must be a Python module path such as '.lib'")
    .default(".lib"),
  /** Shown in the generated file's banner. */
  generatorName: z
    .string()
    .min(1)
    .regex(/^[^\r\n]+$/, "must be a single line")
    .default("wirebind"),
});

export type GeneratorOptions = z.input<typeof generatorOptionsSchema>;
export type ResolvedGeneratorOptions = z.output<typeof generatorOptionsSchema>;

export const cliOptionsSchema = generatorOptionsSchema.extend({
  /** Protocol schema document; the shipped client schema when absent. */
  protocolPath: z.string().min(1).optional(),
  /** Domain schema document; the shipped ledger schema when absent. */
  domainPath: z.string().min(1).optional(),
  /** Output file; stdout when absent. */
  outPath: z.string().min(1).optional(),
  logLevel: z.enum(LOG_LEVELS).default("info"),
});

export type CliOptions = z.input<typeof cliOptionsSchema>;
export type ResolvedCliOptions = z.output<typeof cliOptionsSchema>;

export function resolveGeneratorOptions(input: GeneratorOptions = {}): ResolvedGeneratorOptions {
  const result = generatorOptionsSchema.safeParse(input);
  if (!result.success) {
    throw invalidOptions(result.error, "generator options");
  }
  return result.data;
}

export function resolveCliOptions(input: unknown): ResolvedCliOptions {
  const result = cliOptionsSchema.safeParse(input);
  if (!result.success) {
    throw invalidOptions(result.error, "command line options");
  }
  return result.data;
}

function invalidOptions(error: z.ZodError, label: string): SchemaValidationError {
  const errorMessages = error.errors.map((e) => `  - ${e.path.join(".")}: ${e.message}`).join("\n");
  return new SchemaValidationError(`Invalid ${label}:\n${errorMessages}`, { issues: error.errors });
}
