import { SchemaValidationError, UnmappedTypeError } from "./errors";
import type { TypeRegistry } from "./typeRegistry";
import type { MappingEntry, TypeDefinition, TypeKind } from "./types";

export type MappingTableKind = "protocol" | "domain";

/** Ordered association of native declarations with their generated names. */
export class MappingTable {
  readonly kind: MappingTableKind;
  private readonly entries: MappingEntry[];
  private readonly byType = new Map<string, MappingEntry>();

  constructor(kind: MappingTableKind, entries: Iterable<MappingEntry>) {
    this.kind = kind;
    this.entries = [];
    for (const entry of entries) {
      if (this.byType.has(entry.type)) {
        throw new SchemaValidationError(`Type '${entry.type}' is mapped more than once in the ${kind} table`, {
          table: kind,
          typeName: entry.type,
        });
      }
      this.byType.set(entry.type, entry);
      this.entries.push(entry);
    }
  }

  lookup(typeName: string): string | undefined {
    return this.byType.get(typeName)?.name;
  }

  entry(typeName: string): MappingEntry | undefined {
    return this.byType.get(typeName);
  }

  values(): readonly MappingEntry[] {
    return this.entries;
  }
}

export interface ResolvedMapping {
  entry: MappingEntry;
  definition: TypeDefinition;
  table: MappingTableKind;
}

/**
 * Protocol and domain tables viewed as one: protocol entries first, then domain entries.
 * An identity may live in only one of them.
 */
export class MappingRegistry {
  readonly protocol: MappingTable;
  readonly domain: MappingTable;
  private readonly types: TypeRegistry;

  constructor(protocol: MappingTable, domain: MappingTable, types: TypeRegistry) {
    this.protocol = protocol;
    this.domain = domain;
    this.types = types;
    this.validate();
  }

  /** Concatenated entries in lookup order. */
  all(): ResolvedMapping[] {
    return [
      ...this.protocol.values().map((entry) => this.resolve(entry, "protocol")),
      ...this.domain.values().map((entry) => this.resolve(entry, "domain")),
    ];
  }

  domainEntries(): ResolvedMapping[] {
    return this.domain.values().map((entry) => this.resolve(entry, "domain"));
  }

  lookup(typeName: string): string | undefined {
    return this.protocol.lookup(typeName) ?? this.domain.lookup(typeName);
  }

  lookupDomain(typeName: string): string | undefined {
    return this.domain.lookup(typeName);
  }

  /** Name of a declaration in either table; throws naming the native type and the referencing context. */
  requireAll(typeName: string, context: string): string {
    const name = this.lookup(typeName);
    if (name === undefined) {
      throw new UnmappedTypeError(`Type '${typeName}' (referenced by ${context}) has no protocol or domain mapping`, {
        typeName,
        context,
      });
    }
    return name;
  }

  requireDomain(typeName: string, context: string): string {
    const name = this.lookupDomain(typeName);
    if (name === undefined) {
      throw new UnmappedTypeError(`Type '${typeName}' (referenced by ${context}) has no domain mapping`, {
        typeName,
        context,
      });
    }
    return name;
  }

  /** Declaration name behind a `type-ref`, or undefined for structural types. */
  static identityOf(kind: TypeKind): string | undefined {
    return kind.kind === "type-ref" ? kind.name : undefined;
  }

  private resolve(entry: MappingEntry, table: MappingTableKind): ResolvedMapping {
    return { entry, definition: this.types.get(entry.type), table };
  }

  private validate() {
    const targetNames = new Map<string, string>();
    for (const table of [this.protocol, this.domain]) {
      for (const entry of table.values()) {
        if (!this.types.has(entry.type)) {
          throw new SchemaValidationError(`The ${table.kind} table maps undeclared type '${entry.type}'`, {
            table: table.kind,
            typeName: entry.type,
          });
        }
        if (table === this.domain && this.protocol.lookup(entry.type) !== undefined) {
          throw new SchemaValidationError(
            `Type '${entry.type}' is mapped in both the protocol and the domain table`,
            { typeName: entry.type }
          );
        }
        const previous = targetNames.get(entry.name);
        if (previous !== undefined) {
          throw new SchemaValidationError(
            `Types '${previous}' and '${entry.type}' are both mapped to the name '${entry.name}'`,
            { typeName: entry.type, targetName: entry.name }
          );
        }
        targetNames.set(entry.name, entry.type);
      }
    }
  }
}
