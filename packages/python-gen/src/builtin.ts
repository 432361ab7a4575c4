import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";

const schemasDir = fileURLToPath(new URL("../schemas/", import.meta.url));

/** Shipped protocol schema: operation codes, packet layout and client lifecycle. */
export const BUILTIN_PROTOCOL_SCHEMA_PATH = path.join(schemasDir, "client.yaml");

/** Shipped domain schema: the ledger's accounts, transfers, filters and results. */
export const BUILTIN_DOMAIN_SCHEMA_PATH = path.join(schemasDir, "ledger.yaml");

export function readBuiltinProtocolSchema(): string {
  return fs.readFileSync(BUILTIN_PROTOCOL_SCHEMA_PATH, "utf8");
}

export function readBuiltinDomainSchema(): string {
  return fs.readFileSync(BUILTIN_DOMAIN_SCHEMA_PATH, "utf8");
}
