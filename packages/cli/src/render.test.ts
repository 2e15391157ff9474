import { describe, it, expect } from 'vitest';
import { renderCLIView, stripAnsi, wrapLines } from './render.js';
import { ErrorCode, type CLIErrorView } from '@schemasmith/core';

describe('renderCLIView', () => {
  it('renders title and sections in order', () => {
    const view: CLIErrorView = {
      title: 'Error E001: File not found: data.json',
      code: ErrorCode.INPUT_NOT_FOUND,
      location: 'Location: data.json',
      workaround: 'Check the input path',
      colors: false,
      terminalWidth: 80,
    };

    expect(renderCLIView(view)).toBe(
      [
        '❌ Error E001: File not found: data.json',
        '📍 Location: data.json',
        '💡 Workaround: Check the input path',
      ].join('\n')
    );
  });

  it('lists validation details one per line', () => {
    const view: CLIErrorView = {
      title: 'Error E200: Generated schema does not conform',
      code: ErrorCode.SCHEMA_VALIDATION_FAILED,
      details: ['/minItems: must be >= 0', '/type: must be equal to one of the allowed values'],
      colors: false,
      terminalWidth: 20,
    };

    const lines = renderCLIView(view).split('\n');
    expect(lines.slice(-3)).toEqual([
      'Details:',
      '  - /minItems: must be >= 0',
      '  - /type: must be equal to one of the allowed values',
    ]);
  });

  it('applies ANSI colors when enabled', () => {
    const view: CLIErrorView = {
      title: 'Error E500: Internal error',
      code: ErrorCode.INTERNAL_ERROR,
      colors: true,
      terminalWidth: 80,
    };
    const out = renderCLIView(view);
    expect(out).toBe('\u001B[1;31m❌ Error E500: Internal error\u001B[0m');
    expect(stripAnsi(out)).toBe('❌ Error E500: Internal error');
  });

  it('wraps the excerpt with a hanging indent', () => {
    const view: CLIErrorView = {
      title: 'Error E002: Invalid JSON',
      code: ErrorCode.INVALID_JSON,
      excerpt: '{ "name": 123, "tags": [1, 2',
      colors: false,
      terminalWidth: 20,
    };
    expect(renderCLIView(view).split('\n').slice(1)).toEqual([
      'Excerpt: { "name":',
      '   123, "tags": [1,',
      '   2',
    ]);
  });

  it('dims detail lines but leaves the other sections uncoloured', () => {
    const view: CLIErrorView = {
      title: 'Error E200: Generated schema does not conform',
      code: ErrorCode.SCHEMA_VALIDATION_FAILED,
      details: ['/type: must be string'],
      workaround: 'Report the input',
      colors: true,
      terminalWidth: 80,
    };

    expect(renderCLIView(view).split('\n').slice(1)).toEqual([
      'Details:',
      '\u001B[2m  - /type: must be string\u001B[0m',
      '💡 Workaround: Report the input',
    ]);
  });
});

describe('wrapLines', () => {
  it('returns no lines for blank input', () => {
    expect(wrapLines('', 10)).toEqual([]);
    expect(wrapLines('   ', 10)).toEqual([]);
  });

  it('keeps words longer than the width on their own line', () => {
    expect(wrapLines('a verylongword b', 5)).toEqual(['a', 'verylongword', 'b']);
  });

  it('counts the indent toward the width of continuation lines', () => {
    expect(wrapLines('one two three four', 9, '  ')).toEqual([
      'one two',
      '  three',
      '  four',
    ]);
  });
});
