import { describe, expect, it } from "vitest";
import { defineAlias, defineEnum, defineExtern, defineOperation, field, n, reserved, toTypeKind } from "./define";

describe("type builder", () => {
  it("creates integer kinds", () => {
    expect(n.u16()).toEqual({ kind: "int", bits: 16, signed: false });
    expect(n.uint(10)).toEqual({ kind: "int", bits: 10, signed: false });
    expect(n.int(64)).toEqual({ kind: "int", bits: 64, signed: true });
  });

  it("turns declarations into references", () => {
    const status = defineEnum("status_t", { ok: 0 });
    expect(toTypeKind(status)).toEqual({ kind: "type-ref", name: "status_t" });
    expect(n.pointer(status, { nullable: true })).toEqual({
      kind: "pointer",
      nullable: true,
      pointee: { kind: "type-ref", name: "status_t" },
    });
  });

  it("keeps enum variants in declaration order with bigint values", () => {
    const status = defineEnum("status_t", { ok: 0, failure: 1, later: 10n }, { tagBits: 32 });
    expect(status.kind).toEqual({
      kind: "enum",
      tagBits: 32,
      variants: [
        { name: "ok", value: 0n },
        { name: "failure", value: 1n },
        { name: "later", value: 10n },
      ],
    });
  });

  it("marks reserved fields", () => {
    const account = defineExtern("account_t", [field("id", n.u128()), reserved(n.array(n.u8(), 4))]);
    expect(account.kind.kind === "struct" && account.kind.fields.map((f) => [f.name, f.reserved])).toEqual([
      ["id", false],
      ["reserved", true],
    ]);
  });

  it("builds aliases and operations", () => {
    expect(defineAlias("client_t", n.pointer(n.opaque())).kind).toEqual({
      kind: "pointer",
      nullable: false,
      pointee: { kind: "opaque" },
    });

    const account = defineExtern("account_t", [field("id", n.u128())]);
    expect(
      defineOperation({ name: "lookup_accounts", arity: "batch", event: n.u128(), result: account, eventName: "ids" })
    ).toEqual({
      name: "lookup_accounts",
      arity: "batch",
      event: { kind: "int", bits: 128, signed: false },
      result: { kind: "type-ref", name: "account_t" },
      eventName: "ids",
    });
  });
});
