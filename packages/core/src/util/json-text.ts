/**
 * JSON text writer for schema documents.
 *
 * Output is byte-identical to `JSON.stringify(doc)` (compact) or
 * `JSON.stringify(doc, null, 2)` (pretty), except that `bigint` values are
 * written as exact JSON integers instead of throwing.
 */

export interface SerializeOptions {
  /** Two-space indentation */
  pretty?: boolean;
}

const INDENT = '  ';

export function serializeSchema(doc: unknown, options: SerializeOptions = {}): string {
  const text = write(doc, options.pretty === true ? '\n' : undefined);
  return text ?? 'null';
}

/**
 * Returns undefined for values JSON.stringify drops (undefined, functions,
 * symbols). `newline` carries the current indentation in pretty mode.
 */
function write(value: unknown, newline: string | undefined): string | undefined {
  switch (typeof value) {
    case 'bigint':
      return value.toString();
    case 'number':
      return JSON.stringify(value);
    case 'string':
      return JSON.stringify(value);
    case 'boolean':
      return value ? 'true' : 'false';
    case 'undefined':
    case 'function':
    case 'symbol':
      return undefined;
    case 'object':
      if (value === null) return 'null';
      if (Array.isArray(value)) return writeArray(value, newline);
      return writeObject(value, newline);
  }
}

function writeArray(items: readonly unknown[], newline: string | undefined): string {
  if (items.length === 0) return '[]';
  const inner = newline === undefined ? undefined : newline + INDENT;
  const parts = items.map((item) => write(item, inner) ?? 'null');
  return join('[', parts, ']', newline, inner);
}

function writeObject(record: object, newline: string | undefined): string {
  const inner = newline === undefined ? undefined : newline + INDENT;
  const parts: string[] = [];
  for (const [key, child] of Object.entries(record)) {
    const text: string | undefined = write(child, inner);
    if (text === undefined) continue;
    const separator = newline === undefined ? ':' : ': ';
    parts.push(`${JSON.stringify(key)}${separator}${text}`);
  }
  if (parts.length === 0) return '{}';
  return join('{', parts, '}', newline, inner);
}

function join(
  open: string,
  parts: string[],
  close: string,
  newline: string | undefined,
  inner: string | undefined
): string {
  if (newline === undefined || inner === undefined) {
    return `${open}${parts.join(',')}${close}`;
  }
  return `${open}${inner}${parts.join(`,${inner}`)}${newline}${close}`;
}
