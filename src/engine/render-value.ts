/**
 * Renders values for trace entries and error reasons.
 *
 * Strings are quoted so `"640"` and `640` read differently in an audit trail.
 */
export function renderValue(value: unknown): string {
  switch (typeof value) {
    case 'string':
      return JSON.stringify(value);
    case 'number':
    case 'boolean':
    case 'undefined':
      return String(value);
    case 'bigint':
      return `${value}n`;
    case 'symbol':
      return value.toString();
    case 'function':
      return value.name || 'anonymous';
    case 'object':
      return renderObject(value);
  }
  return String(value);
}

function renderObject(value: object | null): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) {
    return `[${value.map(renderValue).join(', ')}]`;
  }
  if (value instanceof Set) {
    return `{${[...value].map(renderValue).join(', ')}}`;
  }
  if (value instanceof Map) {
    return `{${[...value].map(([k, v]) => `${renderValue(k)}: ${renderValue(v)}`).join(', ')}}`;
  }
  // Ranges, dates, regular expressions and anything else with its own toString
  if (value.toString !== Object.prototype.toString) {
    return String(value);
  }
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    return String(value);
  }
}
