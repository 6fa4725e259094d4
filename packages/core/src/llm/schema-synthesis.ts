type JsonSchemaNode = Record<string, unknown>;

function isNode(value: unknown): value is JsonSchemaNode {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function resolveRef(ref: string, root: JsonSchemaNode): JsonSchemaNode | undefined {
  const match = /^#\/(definitions|\$defs)\/(.+)$/.exec(ref);
  if (!match) {
    return undefined;
  }
  const definitions = root[match[1]];
  if (!isNode(definitions)) {
    return undefined;
  }
  const target = definitions[match[2]];
  return isNode(target) ? target : undefined;
}

function allowsNull(node: JsonSchemaNode): boolean {
  const { type, anyOf } = node;
  if (type === 'null' || (Array.isArray(type) && type.includes('null'))) {
    return true;
  }
  return Array.isArray(anyOf) && anyOf.some((branch) => isNode(branch) && branch['type'] === 'null');
}

function primaryType(node: JsonSchemaNode): unknown {
  const { type } = node;
  return Array.isArray(type) ? type.find((t) => t !== 'null') : type;
}

function synthesize(node: JsonSchemaNode, root: JsonSchemaNode, depth: number): unknown {
  if (depth > 32) {
    return null;
  }

  const ref = node['$ref'];
  if (typeof ref === 'string') {
    const target = resolveRef(ref, root);
    return target ? synthesize(target, root, depth + 1) : null;
  }

  if (allowsNull(node)) {
    return null;
  }

  const { enum: enumValues, anyOf } = node;
  if (Array.isArray(enumValues) && enumValues.length > 0) {
    return enumValues[0];
  }
  if ('const' in node) {
    return node['const'];
  }
  if (Array.isArray(anyOf)) {
    const first: unknown = anyOf[0];
    return isNode(first) ? synthesize(first, root, depth + 1) : null;
  }

  switch (primaryType(node)) {
    case 'object': {
      const rawProperties = node['properties'];
      const properties: JsonSchemaNode = isNode(rawProperties) ? rawProperties : {};
      const rawRequired = node['required'];
      const required: unknown[] = Array.isArray(rawRequired) ? rawRequired : [];
      const value: Record<string, unknown> = {};
      for (const key of required) {
        if (typeof key !== 'string') {
          continue;
        }
        const property = properties[key];
        if (isNode(property)) {
          value[key] = synthesize(property, root, depth + 1);
        }
      }
      return value;
    }
    case 'array':
      return [];
    case 'string':
      return '';
    case 'number':
    case 'integer':
      return typeof node['minimum'] === 'number' ? node['minimum'] : 0;
    case 'boolean':
      return false;
    default:
      return null;
  }
}

/**
 * Builds the minimal value a JSON Schema accepts: required properties only,
 * empty arrays and strings, false, zero or the minimum, null where allowed.
 */
export function synthesizeFromJsonSchema(schema: Record<string, unknown>): unknown {
  return synthesize(schema, schema, 0);
}
