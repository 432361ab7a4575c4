import { mkdirSync, readFileSync, renameSync, rmSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";
import process from "node:process";
import { BindgenError } from "@wirebind/schema";
import { readBuiltinDomainSchema, readBuiltinProtocolSchema } from "./builtin";
import { resolveCliOptions, type ResolvedCliOptions } from "./config";
import { generateFromDocuments } from "./generator";
import { createConsoleLogger, type BindgenLogger } from "./logger";

export interface CliIo {
  stdout: { write(text: string): unknown };
  /** Replaces the stderr console logger. */
  logger?: BindgenLogger;
}

/** Raw flag values; validated by `resolveCliOptions`. */
export function parseArgs(argv: readonly string[]): Record<string, string> {
  const raw: Record<string, string> = {};

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    switch (arg) {
      case "--protocol":
        raw.protocolPath = requireValue(arg, argv[++i]);
        break;
      case "--domain":
        raw.domainPath = requireValue(arg, argv[++i]);
        break;
      case "--out":
        raw.outPath = requireValue(arg, argv[++i]);
        break;
      case "--runtime-module":
        raw.runtimeModule = requireValue(arg, argv[++i]);
        break;
      case "--log-level":
        raw.logLevel = requireValue(arg, argv[++i]);
        break;
      default:
        throw new Error(`Unknown argument '${arg}'`);
    }
  }

  return raw;
}

function requireValue(flag: string, value: string | undefined): string {
  if (!value || value.startsWith("--")) {
    throw new Error(`Expected value after ${flag}`);
  }
  return value;
}

/** Runs one generation from command-line arguments and returns the process exit code. */
export function runCli(argv: readonly string[], io: CliIo = { stdout: process.stdout }): number {
  let logger = io.logger ?? createConsoleLogger();
  try {
    const options = resolveCliOptions(parseArgs(argv));
    logger = io.logger ?? createConsoleLogger("wirebind", options.logLevel);

    const source = generateFromDocuments(readProtocol(options), readDomain(options), {
      runtimeModule: options.runtimeModule,
      generatorName: options.generatorName,
      logger,
    });

    if (options.outPath === undefined) {
      io.stdout.write(source);
    } else {
      writeAtomically(options.outPath, source);
      logger.info(`Wrote ${options.outPath}`);
    }
    return 0;
  } catch (error) {
    if (error instanceof BindgenError) {
      logger.error(error.message, { code: error.code, ...error.details });
    } else {
      logger.error(error instanceof Error ? error.message : String(error));
    }
    return 1;
  }
}

function readProtocol(options: ResolvedCliOptions): string {
  return options.protocolPath === undefined ? readBuiltinProtocolSchema() : readFileSync(options.protocolPath, "utf8");
}

function readDomain(options: ResolvedCliOptions): string {
  return options.domainPath === undefined ? readBuiltinDomainSchema() : readFileSync(options.domainPath, "utf8");
}

/** Writes beside the target first so a reader never sees a partial file. */
function writeAtomically(outPath: string, contents: string): void {
  mkdirSync(dirname(outPath), { recursive: true });
  const tmpPath = `${outPath}.${process.pid}.tmp`;
  try {
    writeFileSync(tmpPath, contents, "utf8");
    renameSync(tmpPath, outPath);
  } catch (error) {
    rmSync(tmpPath, { force: true });
    throw error;
  }
}
