import type { ZodTypeAny } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';

const DROPPED_KEYS = new Set(['$schema', 'definitions', '$defs', 'components', '$ref']);

function stripDefaults(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(stripDefaults);
  }
  if (value && typeof value === 'object') {
    const next: Record<string, unknown> = {};
    for (const [key, nested] of Object.entries(value)) {
      if (key === 'default') {
        continue;
      }
      next[key] = stripDefaults(nested);
    }
    return next;
  }
  return value;
}

// Route schemas only document the payload; zod does the actual parsing.
export function toJsonSchema(schema: ZodTypeAny, name?: string): Record<string, unknown> {
  const jsonSchema = name
    ? zodToJsonSchema(schema, { $refStrategy: 'none', name, nameStrategy: 'title' })
    : zodToJsonSchema(schema, { $refStrategy: 'none' });
  const stripped = stripDefaults(jsonSchema);
  const result: Record<string, unknown> = {};
  if (stripped && typeof stripped === 'object') {
    for (const [key, nested] of Object.entries(stripped)) {
      if (!DROPPED_KEYS.has(key)) {
        result[key] = nested;
      }
    }
  }
  return result;
}
