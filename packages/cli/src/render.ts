/**
 * Terminal rendering of a presenter view.
 *
 * A view becomes an ordered list of sections. Each section has one style and
 * is either wrapped to the terminal width or kept on a single line.
 */

import type { CLIErrorView } from '@schemasmith/core';

type Style = 'alert' | 'muted' | 'plain';

// One SGR sequence per style; 'plain' is never wrapped in codes.
const SGR: Record<Exclude<Style, 'plain'>, string> = {
  alert: '\u001B[1;31m',
  muted: '\u001B[2m',
};
const SGR_RESET = '\u001B[0m';

interface Section {
  text: string;
  style: Style;
  /** Wrap to the terminal width with a hanging indent. */
  wrap: boolean;
}

const HANGING_INDENT = '   ';

function sectionsOf(view: CLIErrorView): Section[] {
  const sections: Section[] = [
    { text: `❌ ${view.title}`, style: 'alert', wrap: false },
  ];

  if (view.location) {
    sections.push({ text: `📍 ${view.location}`, style: 'plain', wrap: true });
  }
  if (view.excerpt) {
    sections.push({ text: `Excerpt: ${view.excerpt}`, style: 'plain', wrap: true });
  }

  const details = view.details ?? [];
  if (details.length > 0) {
    sections.push({ text: 'Details:', style: 'plain', wrap: false });
    // JSON Pointers stay whole so they can be copied
    for (const detail of details) {
      sections.push({ text: `  - ${detail}`, style: 'muted', wrap: false });
    }
  }

  if (view.workaround) {
    sections.push({
      text: `💡 Workaround: ${view.workaround}`,
      style: 'plain',
      wrap: true,
    });
  }
  return sections;
}

/**
 * Break `text` at whitespace into lines of at most `width` characters. Lines
 * after the first start with `indent`, which counts toward the width. A word
 * longer than the width gets a line of its own.
 */
export function wrapLines(text: string, width: number, indent = ''): string[] {
  const lines: string[] = [];
  let current = '';

  for (const word of text.split(/\s+/).filter(Boolean)) {
    if (current === '') {
      current = word;
    } else if (current.length + 1 + word.length <= width) {
      current += ` ${word}`;
    } else {
      lines.push(current);
      current = indent + word;
    }
  }

  if (current !== '') lines.push(current);
  return lines;
}

function paint(line: string, style: Style, colors: boolean): string {
  return colors && style !== 'plain' ? `${SGR[style]}${line}${SGR_RESET}` : line;
}

export function renderCLIView(view: CLIErrorView): string {
  const width = view.terminalWidth > 0 ? view.terminalWidth : 80;

  return sectionsOf(view)
    .flatMap((section) =>
      (section.wrap
        ? wrapLines(section.text, width, HANGING_INDENT)
        : [section.text]
      ).map((line) => paint(line, section.style, view.colors))
    )
    .join('\n');
}

/** Remove the SGR colour sequences written by `renderCLIView`. */
export function stripAnsi(input: string): string {
  // eslint-disable-next-line no-control-regex
  return input.replace(/\u001B\[[\d;]*m/g, '');
}
