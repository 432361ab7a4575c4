import {
  composeSchemas,
  defineAlias,
  defineEnum,
  defineExtern,
  defineOperation,
  definePacked,
  field,
  n,
  reserved,
  type ComposedSchema,
  type SchemaDocument,
} from "@wirebind/schema";
import type { LoweringContext } from "../lowering/context";

export const operation = defineEnum("operation_t", {
  reserved: 0,
  pulse: 128,
  create_accounts: 129,
  lookup_accounts: 130,
  query_accounts: 131,
});
export const status = defineEnum("status_t", { success: 0, unexpected: 1 }, { tagBits: 32 });
export const handle = defineAlias("client_t", n.pointer(n.opaque()));
export const packet = defineExtern("packet_t", [
  field("next", n.pointer(n.ref("packet_t"), { nullable: true })),
  field("data", n.pointer(n.opaque(), { nullable: true })),
  field("data_size", n.u32()),
  field("operation", n.u8()),
  reserved(n.array(n.u8(), 3)),
]);

export const accountFlags = definePacked("account_flags_t", [
  field("linked", n.bool()),
  field("pending", n.bool()),
  field("padding", n.uint(14)),
]);
export const account = defineExtern("account_t", [
  field("id", n.u128()),
  field("ledger", n.u32()),
  field("code", n.u16()),
  field("flags", accountFlags),
  reserved(n.u32()),
  field("timestamp", n.u64()),
]);
export const result = defineEnum("result_t", { ok: 0, exists: 1 }, { tagBits: 32 });
export const accountsResult = defineExtern("accounts_result_t", [field("index", n.u32()), field("result", result)]);
export const filter = defineExtern("filter_t", [
  field("account_id", n.u128()),
  field("limit", n.u32()),
  reserved(n.array(n.u8(), 4)),
]);

export function protocolDocument(overrides: Partial<SchemaDocument> = {}): SchemaDocument {
  return {
    metadata: { name: "client", version: 1 },
    types: [operation, status, handle, packet],
    mappings: [
      { type: "operation_t", name: "Operation", skip: ["reserved"] },
      { type: "status_t", name: "Status" },
      { type: "client_t", name: "Client" },
      { type: "packet_t", name: "Packet" },
    ],
    operations: [],
    client: {
      library: "clientlib",
      symbolPrefix: "test_client",
      roles: { operation: "operation_t", status: "status_t", packet: "packet_t", handle: "client_t" },
    },
    ...overrides,
  };
}

export function domainDocument(overrides: Partial<SchemaDocument> = {}): SchemaDocument {
  return {
    metadata: { name: "accounts", version: 2 },
    types: [accountFlags, account, result, accountsResult, filter],
    mappings: [
      { type: "account_flags_t", name: "AccountFlags" },
      { type: "account_t", name: "Account" },
      { type: "result_t", name: "Result" },
      { type: "accounts_result_t", name: "AccountsResult" },
      { type: "filter_t", name: "Filter" },
    ],
    operations: [
      defineOperation({ name: "pulse", arity: "single", event: n.void(), result: n.void(), eventName: "pulse" }),
      defineOperation({
        name: "create_accounts",
        arity: "batch",
        event: account,
        result: accountsResult,
        eventName: "accounts",
      }),
      defineOperation({ name: "lookup_accounts", arity: "batch", event: n.u128(), result: account, eventName: "ids" }),
      defineOperation({ name: "query_accounts", arity: "single", event: filter, result: account, eventName: "filter" }),
    ],
    ...overrides,
  };
}

export function composeFixture(
  protocol: Partial<SchemaDocument> = {},
  domain: Partial<SchemaDocument> = {}
): ComposedSchema {
  return composeSchemas(protocolDocument(protocol), domainDocument(domain));
}

export function loweringContext(schema: ComposedSchema = composeFixture()): LoweringContext {
  return { types: schema.types, mappings: schema.mappings };
}
