/**
 * Schema document types produced by the inference core.
 * A subset of the JSON Schema draft 2020-12 vocabulary.
 */

/** Numeric keyword value; bigint only once an integer leaves the safe range */
export type SchemaNumber = number | bigint;

/** JSON literal carried by `examples` */
export type SchemaExample = string | SchemaNumber | boolean;

/**
 * Keywords shared by every generated document
 */
export interface BaseSchemaDoc {
  $schema?: string;
  title?: string;
  description?: string;
}

export interface ObjectSchemaDoc extends BaseSchemaDoc {
  type: 'object';
  properties: Record<string, SchemaDoc>;
  required?: string[];
  additionalProperties?: boolean;
  minProperties?: number;
}

/** `items` of a heterogeneous array: one schema per element, in order */
export interface OneOfItems {
  oneOf: SchemaDoc[];
}

/** `items` of an empty array */
export type EmptyItems = Record<string, never>;

export type ArrayItems = SchemaDoc | OneOfItems | EmptyItems;

export interface ArraySchemaDoc extends BaseSchemaDoc {
  type: 'array';
  items: ArrayItems;
  minItems?: number;
  maxItems?: number;
  uniqueItems?: boolean;
}

export type StringFormat = 'email' | 'uri';

export interface StringSchemaDoc extends BaseSchemaDoc {
  type: 'string';
  minLength?: number;
  maxLength?: number;
  examples?: string[];
  format?: StringFormat;
  pattern?: string;
}

export interface NumberSchemaDoc extends BaseSchemaDoc {
  type: 'integer' | 'number';
  minimum?: SchemaNumber;
  maximum?: SchemaNumber;
  examples?: SchemaNumber[];
  multipleOf?: number;
}

export interface BooleanSchemaDoc extends BaseSchemaDoc {
  type: 'boolean';
  examples?: boolean[];
}

export interface NullSchemaDoc {
  type: 'null';
}

export type SchemaDoc =
  | ObjectSchemaDoc
  | ArraySchemaDoc
  | StringSchemaDoc
  | NumberSchemaDoc
  | BooleanSchemaDoc
  | NullSchemaDoc;

export type SchemaType = SchemaDoc['type'];

export function isOneOfItems(items: ArrayItems): items is OneOfItems {
  return 'oneOf' in items;
}

export function isEmptyItems(items: ArrayItems): items is EmptyItems {
  return Object.keys(items).length === 0;
}
