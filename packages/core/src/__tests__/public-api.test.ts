import { describe, it, expect } from 'vitest';
import * as core from '../index.js';

describe('@schemasmith/core public API', () => {
  it('exposes the inference entry points', () => {
    expect(typeof core.generateSchema).toBe('function');
    expect(typeof core.inferSchema).toBe('function');
    expect(typeof core.serializeSchema).toBe('function');
    expect(typeof core.parseTier).toBe('function');
    expect(core.TIERS).toEqual(['basic', 'standard', 'comprehensive', 'expert']);
  });

  it('exposes the error surface used by the CLI', () => {
    expect(typeof core.ErrorPresenter).toBe('function');
    expect(typeof core.SchemasmithError).toBe('function');
    expect(core.getExitCode(core.ErrorCode.INVALID_TIER)).toBe(41);
    expect(typeof core.SchemaDocumentValidator).toBe('function');
  });

  it('round-trips a document through the facade', () => {
    const doc = core.generateSchema({ id: 7, tags: ['x'] }, 'standard');
    expect(core.serializeSchema(doc)).toBe(
      '{"type":"object","properties":{"id":{"type":"integer","minimum":7},' +
        '"tags":{"type":"array","items":{"type":"string","minLength":0},"minItems":0}},' +
        '"required":["id","tags"],"additionalProperties":true}'
    );
  });
});
