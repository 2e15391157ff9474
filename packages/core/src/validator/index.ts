/**
 * Validator module exports
 */

export {
  SchemaDocumentValidator,
  type SchemaValidationReport,
} from './schema-document-validator.js';
export { createValidatorAjv } from './ajv-factory.js';
