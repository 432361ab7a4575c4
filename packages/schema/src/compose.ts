import { SchemaValidationError } from "./errors";
import { MappingRegistry, MappingTable } from "./mappings";
import { buildTypeRegistry, validateTypeKind, type TypeRegistry } from "./typeRegistry";
import type { ClientLibrary, OperationDefinition, SchemaDocument, SchemaMetadata } from "./types";

/** Everything one generation run consumes: both documents resolved against each other. */
export interface ComposedSchema {
  protocol: SchemaMetadata;
  domain: SchemaMetadata;
  types: TypeRegistry;
  mappings: MappingRegistry;
  operations: OperationDefinition[];
  client: ClientLibrary;
}

/**
 * Combines the fixed protocol document with a domain document.
 *
 * Declarations from both documents share one namespace. The protocol document supplies the
 * protocol mapping table and the client library description; the domain document supplies
 * the domain mapping table. Operations may come from either and keep document order.
 */
export function composeSchemas(protocol: SchemaDocument, domain: SchemaDocument): ComposedSchema {
  const client = protocol.client;
  if (!client) {
    throw new SchemaValidationError(`Protocol schema '${protocol.metadata.name}' must describe its client library`, {
      schema: protocol.metadata.name,
    });
  }

  const types = buildTypeRegistry([...protocol.types, ...domain.types]);
  const mappings = new MappingRegistry(
    new MappingTable("protocol", protocol.mappings),
    new MappingTable("domain", domain.mappings),
    types
  );
  const operations = [...protocol.operations, ...domain.operations];

  validateClientRoles(client, types, mappings);
  validateOperations(operations, client, types);

  return {
    protocol: protocol.metadata,
    domain: domain.metadata,
    types,
    mappings,
    operations,
    client,
  };
}

function validateClientRoles(client: ClientLibrary, types: TypeRegistry, mappings: MappingRegistry) {
  for (const [role, typeName] of Object.entries(client.roles)) {
    if (!types.has(typeName)) {
      throw new SchemaValidationError(`Client role '${role}' names undeclared type '${typeName}'`, { role, typeName });
    }
    mappings.requireAll(typeName, `client role '${role}'`);
  }

  const operation = types.get(client.roles.operation);
  if (operation.kind.kind !== "enum") {
    throw new SchemaValidationError(`Client role 'operation' must name an enum, '${operation.name}' is not one`, {
      typeName: operation.name,
    });
  }

  const packet = types.get(client.roles.packet);
  if (packet.kind.kind !== "struct" || packet.kind.layout !== "extern") {
    throw new SchemaValidationError(`Client role 'packet' must name an extern struct, '${packet.name}' is not one`, {
      typeName: packet.name,
    });
  }
}

function validateOperations(operations: OperationDefinition[], client: ClientLibrary, types: TypeRegistry) {
  const operationEnum = types.get(client.roles.operation).kind;
  const members = new Set(operationEnum.kind === "enum" ? operationEnum.variants.map((variant) => variant.name) : []);

  const seen = new Set<string>();
  for (const operation of operations) {
    if (seen.has(operation.name)) {
      throw new SchemaValidationError(`Operation '${operation.name}' is declared more than once`, {
        operation: operation.name,
      });
    }
    seen.add(operation.name);

    if (!members.has(operation.name)) {
      throw new SchemaValidationError(
        `Operation '${operation.name}' is not a member of the operation enum '${client.roles.operation}'`,
        { operation: operation.name, operationEnum: client.roles.operation }
      );
    }

    validateTypeKind(operation.event, types, `operation '${operation.name}' event`);
    validateTypeKind(operation.result, types, `operation '${operation.name}' result`);
  }
}
