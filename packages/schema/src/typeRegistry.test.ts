import { describe, expect, it } from "vitest";
import { defineAlias, defineEnum, defineExtern, definePacked, field, n } from "./define";
import { SchemaValidationError } from "./errors";
import { buildTypeRegistry, TypeRegistry } from "./typeRegistry";

describe("TypeRegistry", () => {
  it("looks declarations up by name", () => {
    const status = defineEnum("status_t", { ok: 0, failure: 1 });
    const registry = new TypeRegistry([status]);
    expect(registry.get("status_t")).toBe(status);
    expect(registry.has("missing")).toBe(false);
    expect(registry.size).toBe(1);
  });

  it("rejects duplicate declarations", () => {
    expect(() => new TypeRegistry([defineAlias("a", n.u8()), defineAlias("a", n.u16())])).toThrowError(
      "Duplicate type definition 'a'"
    );
  });

  it("throws for unknown names", () => {
    expect(() => new TypeRegistry([]).get("nope")).toThrowError(SchemaValidationError);
  });
});

describe("buildTypeRegistry", () => {
  it("allows a struct to link to itself through a pointer", () => {
    const packet = defineExtern("packet_t", [
      field("next", n.pointer(n.ref("packet_t"), { nullable: true })),
      field("size", n.u32()),
    ]);
    expect(buildTypeRegistry([packet]).has("packet_t")).toBe(true);
  });

  it("rejects by-value cycles", () => {
    const a = defineExtern("a_t", [field("b", n.ref("b_t"))]);
    const b = defineExtern("b_t", [field("a", n.array(n.ref("a_t"), 2))]);
    expect(() => buildTypeRegistry([a, b])).toThrowError("Cyclic type reference detected: a_t -> b_t -> a_t");
  });

  it("reports only the declarations on the cycle", () => {
    const outer = defineExtern("outer_t", [field("inner", n.ref("a_t"))]);
    const a = defineExtern("a_t", [field("b", n.ref("b_t"))]);
    const b = defineExtern("b_t", [field("a", n.ref("a_t"))]);
    expect(() => buildTypeRegistry([outer, a, b])).toThrowError("Cyclic type reference detected: a_t -> b_t -> a_t");
  });

  it("rejects aliases that resolve to themselves", () => {
    const x = defineAlias("x_t", n.ref("y_t"));
    const y = defineAlias("y_t", n.ref("x_t"));
    expect(() => buildTypeRegistry([x, y])).toThrowError("Cyclic type reference detected: x_t -> y_t -> x_t");
  });

  it("rejects references to undeclared types", () => {
    const account = defineExtern("account_t", [field("flags", n.ref("account_flags_t"))]);
    expect(() => buildTypeRegistry([account])).toThrowError(
      "Type 'account_t.flags' references unknown type 'account_flags_t'"
    );
  });

  it("rejects duplicate field names", () => {
    const flags = definePacked("flags_t", [field("linked", n.bool()), field("linked", n.bool())]);
    expect(() => buildTypeRegistry([flags])).toThrowError("Struct 'flags_t' declares field 'linked' more than once");
  });

  it("rejects enum values that do not fit the tag", () => {
    const status = defineEnum("status_t", { ok: 0, huge: 256 }, { tagBits: 8 });
    expect(() => buildTypeRegistry([status])).toThrowError("Variant 'huge' in enum 'status_t' does not fit in u8");
  });

  it("rejects enum variants sharing a value", () => {
    const status = defineEnum("status_t", { ok: 0, fine: 0 });
    expect(() => buildTypeRegistry([status])).toThrowError(
      "Variants 'ok' and 'fine' in enum 'status_t' share the value 0"
    );
  });

  it("rejects anonymous structs in field position", () => {
    const outer = defineExtern("outer_t", [
      { name: "inner", type: { kind: "struct", layout: "extern", fields: [] }, reserved: false },
    ]);
    expect(() => buildTypeRegistry([outer])).toThrowError(
      "Anonymous struct in 'outer_t.inner' must be declared and referenced by name"
    );
  });
});
