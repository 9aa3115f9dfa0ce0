/**
 * Value printing for matcher descriptions.
 *
 * Strings are single quoted so that whitespace inside class names and
 * attribute values stays visible in failure messages.
 */

const MAX_DEPTH = 2;

const isDomElement = (value: object): value is Element =>
  typeof Element !== 'undefined' && value instanceof Element;

const hasOwnToString = (value: object): boolean =>
  typeof value.toString === 'function' && value.toString !== Object.prototype.toString;

export function describeValue(value: unknown, depth = 0): string {
  if (value === null) return '<null>';
  if (value === undefined) return '<undefined>';
  if (typeof value === 'string') return `'${value}'`;
  if (typeof value === 'function') {
    return value.name ? `<Function ${value.name}>` : '<Function>';
  }
  if (typeof value !== 'object') return String(value);

  if (isDomElement(value)) return `<${value.localName}>`;
  if (value instanceof Error) return String(value);

  const nested = (item: unknown) => describeValue(item, depth + 1);

  if (Array.isArray(value)) {
    return depth >= MAX_DEPTH ? '[...]' : `[${value.map(nested).join(', ')}]`;
  }
  if (depth >= MAX_DEPTH) return '{...}';
  if (value instanceof Set) {
    return `{${Array.from(value, nested).join(', ')}}`;
  }
  if (value instanceof Map) {
    return `{${Array.from(value, ([key, item]) => `${nested(key)}: ${nested(item)}`).join(', ')}}`;
  }
  if (hasOwnToString(value)) return String(value);

  return `{${Object.entries(value)
    .map(([key, item]) => `${key}: ${nested(item)}`)
    .join(', ')}}`;
}
