import {
  defineAlias,
  defineEnum,
  defineExtern,
  defineOperation,
  defineStruct,
  field,
  LoweringError,
  n,
  UnmappedTypeError,
} from "@wirebind/schema";
import { describe, expect, it } from "vitest";
import { account, composeFixture, domainDocument } from "./__tests__/helpers";
import { readBuiltinDomainSchema, readBuiltinProtocolSchema } from "./builtin";
import { generateBindings, generateFromDocuments } from "./generator";
import type { BindgenLogger } from "./logger";

function recordingLogger(): { logger: BindgenLogger; messages: string[] } {
  const messages: string[] = [];
  const record = (level: string) => (message: string) => {
    messages.push(`${level}: ${message}`);
  };
  return {
    logger: { debug: record("debug"), info: record("info"), warn: record("warn"), error: record("error") },
    messages,
  };
}

describe("generateBindings", () => {
  const source = generateBindings(composeFixture());

  it("emits declarations and aliases in mapping order", () => {
    expect(source).toContain(
      [
        "class Operation(enum.IntEnum):",
        "    PULSE = 128",
        "    CREATE_ACCOUNTS = 129",
        "    LOOKUP_ACCOUNTS = 130",
        "    QUERY_ACCOUNTS = 131",
        "",
        "",
        "class Status(enum.IntEnum):",
        "    SUCCESS = 0",
        "    UNEXPECTED = 1",
        "",
        "",
        "Client = ctypes.c_void_p",
        "",
        "class AccountFlags(enum.IntFlag):",
        "    NONE = 0",
        "    LINKED = 1 << 0",
        "    PENDING = 1 << 1",
        "",
        "",
        "class Result(enum.IntEnum):",
        "    OK = 0",
        "    EXISTS = 1",
        "",
        "",
        "@dataclass",
        "class Account:",
      ].join("\n")
    );
  });

  it("orders the sections", () => {
    const markers = [
      "## This file was auto-generated by wirebind ##",
      "from .lib import c_uint128, clientlib, dataclass, validate_uint",
      "class Operation(enum.IntEnum):",
      "Client = ctypes.c_void_p",
      "@dataclass\nclass Account:",
      "@dataclass\nclass AccountsResult:",
      "@dataclass\nclass Filter:",
      "class CPacket(ctypes.Structure):",
      "class CAccount(ctypes.Structure):",
      "class CAccountsResult(ctypes.Structure):",
      "class CFilter(ctypes.Structure):",
      "OnCompletion = ctypes.CFUNCTYPE(",
      "test_client_init = clientlib.test_client_init",
      "test_client_submit = clientlib.test_client_submit",
      "class AsyncStateMachineMixin:",
      "class StateMachineMixin:",
    ];
    const positions = markers.map((marker) => source.indexOf(marker));
    expect(positions.every((position) => position >= 0)).toBe(true);
    expect([...positions].sort((a, b) => a - b)).toEqual(positions);
  });

  it("gives only domain structs a value record", () => {
    expect(source).not.toContain("class Packet:");
    expect(source).toContain("    def to_python(self):\n        return Account(");
    expect(source.split("def to_python").length - 1).toBe(3);
  });

  it("emits two methods per public operation", () => {
    expect(source.split("self._submit(").length - 1).toBe(6);
    expect(source).not.toContain("def pulse");
    expect(source).toContain("    async def lookup_accounts(self, ids: list[int]) -> list[Account]:");
    expect(source).toContain("    def lookup_accounts(self, ids: list[int]) -> list[Account]:");
  });

  it("ends with a single newline", () => {
    expect(source.endsWith("            CAccount,\n        )\n")).toBe(true);
  });

  it("is deterministic", () => {
    expect(generateBindings(composeFixture())).toBe(source);
  });

  it("applies generator options", () => {
    const custom = generateBindings(composeFixture(), { runtimeModule: "ledger.runtime", generatorName: "ledger-gen" });
    expect(custom).toContain("## This file was auto-generated by ledger-gen ##");
    expect(custom).toContain("from ledger.runtime import c_uint128, clientlib, dataclass, validate_uint");
  });

  it("logs each pass", () => {
    const { logger, messages } = recordingLogger();
    generateBindings(composeFixture(), { logger });
    expect(messages).toEqual([
      "debug: Emitting enums, flags and aliases",
      "debug: Emitting value records",
      "debug: Emitting structure bindings",
      "debug: Emitting native functions",
      "debug: Emitting operation mixins",
      "info: Generated bindings for accounts v2",
    ]);
  });

  it("rejects structs without a defined layout", () => {
    const loose = defineStruct("loose_t", "auto", [field("id", n.u64())]);
    const schema = composeFixture(
      {},
      {
        types: [...domainDocument().types, loose],
        mappings: [...domainDocument().mappings, { type: "loose_t", name: "Loose" }],
      }
    );
    expect(() => generateBindings(schema)).toThrowError(
      new LoweringError("Struct 'loose_t' has no defined layout and cannot be bound")
    );
  });

  it("names the field whose type is unmapped", () => {
    const kind = defineEnum("kind_t", { a: 0 });
    const tagged = defineExtern("tagged_t", [field("kind", kind)]);
    const schema = composeFixture(
      {},
      {
        types: [...domainDocument().types, kind, tagged],
        mappings: [...domainDocument().mappings, { type: "tagged_t", name: "Tagged" }],
      }
    );
    expect(() => generateBindings(schema)).toThrowError(UnmappedTypeError);
    expect(() => generateBindings(schema)).toThrowError(
      "Type 'kind_t' (referenced by tagged_t.kind) has no domain mapping"
    );
  });

  it("marshals aliased wide integers with the runtime wrapper", () => {
    const id = defineAlias("id_t", n.u128());
    const schema = composeFixture(
      {},
      {
        types: [...domainDocument().types, id],
        mappings: [...domainDocument().mappings, { type: "id_t", name: "Id" }],
        operations: [
          defineOperation({ name: "lookup_accounts", arity: "batch", event: id, result: account, eventName: "ids" }),
        ],
      }
    );
    const aliased = generateBindings(schema);
    expect(aliased).toContain("Id = c_uint128\n");
    expect(aliased).toContain(
      "    def lookup_accounts(self, ids: list[int]) -> list[Account]:\n" +
        "        return self._submit(\n" +
        "            Operation.LOOKUP_ACCOUNTS,\n" +
        "            ids,\n" +
        "            c_uint128,\n" +
        "            CAccount,\n"
    );
    expect(aliased).not.toContain("CId");
  });

  it("rejects invalid options before emitting", () => {
    expect(() => generateBindings(composeFixture(), { runtimeModule: "" })).toThrowError(/Invalid generator options/);
  });
});

describe("generateFromDocuments with the shipped schemas", () => {
  const source = generateFromDocuments(readBuiltinProtocolSchema(), readBuiltinDomainSchema());

  it("keeps the heartbeat in the operation enum but hides internal members", () => {
    expect(source).toContain("class Operation(enum.IntEnum):\n    PULSE = 128\n    CREATE_ACCOUNTS = 129\n");
    expect(source).not.toContain("    ROOT = 1");
  });

  it("drops flag padding", () => {
    expect(source).toContain(
      [
        "class AccountFlags(enum.IntFlag):",
        "    NONE = 0",
        "    LINKED = 1 << 0",
        "    DEBITS_MUST_NOT_EXCEED_CREDITS = 1 << 1",
        "    CREDITS_MUST_NOT_EXCEED_DEBITS = 1 << 2",
        "    HISTORY = 1 << 3",
        "    IMPORTED = 1 << 4",
        "    CLOSED = 1 << 5",
        "",
        "",
        "",
      ].join("\n")
    );
    expect(source).not.toContain("PADDING");
  });

  it("binds the packet layout", () => {
    expect(source).toContain(
      [
        "CPacket._fields_ = [ # noqa: SLF001",
        '    ("next", ctypes.POINTER(CPacket)),',
        '    ("user_data", ctypes.c_void_p),',
        '    ("operation", ctypes.c_uint8),',
        '    ("status", ctypes.c_uint8),',
        '    ("data_size", ctypes.c_uint32),',
        '    ("data", ctypes.c_void_p),',
        '    ("batch_next", ctypes.POINTER(CPacket)),',
        '    ("batch_tail", ctypes.POINTER(CPacket)),',
        '    ("batch_size", ctypes.c_uint32),',
        '    ("batch_allowed", ctypes.c_bool),',
        '    ("reserved", ctypes.c_uint8 * 7),',
        "]",
      ].join("\n")
    );
  });

  it("converts nested enums and flags back to domain values", () => {
    expect(source).toContain("            result=CreateTransferResult(self.result),");
    expect(source).toContain("            flags=TransferFlags(self.flags),");
    expect(source).toContain('    ("flags", ctypes.c_uint32),\n]');
  });

  it("declares every public operation in both conventions", () => {
    expect(source.split("self._submit(").length - 1).toBe(16);
    expect(source).toContain("    async def query_transfers(self, query_filter: QueryFilter) -> list[Transfer]:");
    expect(source).toContain(
      "    def create_transfers(self, transfers: list[Transfer]) -> list[CreateTransfersResult]:"
    );
    expect(source).toContain("ledger_client_init_echo.argtypes = [ctypes.POINTER(Client), c_uint128");
  });
});
