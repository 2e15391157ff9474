import { Ajv2020 } from 'ajv/dist/2020.js';

/**
 * Ajv instance for the draft 2020-12 dialect the generators emit.
 *
 * Formats are annotations only: `email` and `uri` are never asserted, so no
 * format plugin is registered. A new instance is returned on each call.
 */
export function createValidatorAjv(): Ajv2020 {
  return new Ajv2020({
    strict: true,
    strictTypes: false,
    allErrors: true,
    validateFormats: false,
  });
}
