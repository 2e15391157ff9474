/**
 * Shell completion scripts generated from the commander definition, so the
 * scripts follow the options and commands the program actually declares.
 */

import type { Command } from 'commander';
import { ConfigError, TIERS, didYouMean } from '@schemasmith/core';
import { LOG_LEVELS } from './logger.js';

export const SHELLS = ['bash', 'zsh', 'fish'] as const;

export type Shell = (typeof SHELLS)[number];

/** Options whose value is a path. */
const FILE_OPTIONS: ReadonlySet<string> = new Set(['--output', '--config']);

/** Fixed value sets offered after an option, keyed by long flag. */
const VALUE_COMPLETIONS: Readonly<Record<string, readonly string[]>> = {
  '--tier': TIERS,
  '--log-level': LOG_LEVELS,
};

interface OptionSpec {
  short?: string;
  long: string;
  description: string;
  takesValue: boolean;
  files: boolean;
  values?: readonly string[];
}

interface CommandSpec {
  name: string;
  description: string;
  /** Values for the command's first argument, when fixed. */
  values?: readonly string[];
}

export function parseShell(raw: string): Shell {
  const normalized = raw.trim().toLowerCase();
  const shell = SHELLS.find((candidate) => candidate === normalized);
  if (shell) return shell;

  const error = new ConfigError({
    message: `Unsupported shell "${raw}". Expected one of: ${SHELLS.join(', ')}.`,
    context: { setting: 'shell', value: raw },
  });
  error.suggestions = didYouMean(normalized, SHELLS).map(
    (candidate) => `Use "completion ${candidate}"`
  );
  throw error;
}

export function generateCompletion(program: Command, shell: Shell): string {
  const name = program.name();
  const options = collectOptions(program);
  const commands = collectCommands(program);

  switch (shell) {
    case 'bash':
      return bashScript(name, options, commands);
    case 'zsh':
      return zshScript(name, options, commands);
    case 'fish':
      return fishScript(name, options, commands);
  }
}

function collectOptions(program: Command): OptionSpec[] {
  const specs: OptionSpec[] = [];
  for (const option of program.options) {
    if (option.long === undefined) continue;
    specs.push({
      short: option.short,
      long: option.long,
      description: option.description,
      takesValue: option.required || option.optional,
      files: FILE_OPTIONS.has(option.long),
      values: VALUE_COMPLETIONS[option.long],
    });
  }
  // commander registers the help flag lazily
  specs.push({
    short: '-h',
    long: '--help',
    description: 'display help for command',
    takesValue: false,
    files: false,
  });
  return specs;
}

function collectCommands(program: Command): CommandSpec[] {
  return program.commands.map((command) => ({
    name: command.name(),
    description: command.description(),
    values: command.name() === 'completion' ? SHELLS : undefined,
  }));
}

function flagsOf(option: OptionSpec): string[] {
  return option.short ? [option.short, option.long] : [option.long];
}

function bashScript(
  name: string,
  options: OptionSpec[],
  commands: CommandSpec[]
): string {
  const fn = `_${name.replace(/[^A-Za-z0-9_]/g, '_')}`;
  const allFlags = options.flatMap(flagsOf).join(' ');
  const lines: string[] = [
    `# bash completion for ${name}`,
    `${fn}() {`,
    '  local cur prev',
    '  cur="${COMP_WORDS[COMP_CWORD]}"',
    '  prev="${COMP_WORDS[COMP_CWORD-1]}"',
    '',
    '  case "$prev" in',
  ];

  for (const option of options.filter((o) => o.takesValue)) {
    lines.push(`    ${flagsOf(option).join('|')})`);
    lines.push(
      option.values
        ? `      COMPREPLY=( $(compgen -W "${option.values.join(' ')}" -- "$cur") )`
        : option.files
          ? '      COMPREPLY=( $(compgen -f -- "$cur") )'
          : '      COMPREPLY=()'
    );
    lines.push('      return 0', '      ;;');
  }
  for (const command of commands.filter((c) => c.values)) {
    lines.push(`    ${command.name})`);
    lines.push(
      `      COMPREPLY=( $(compgen -W "${(command.values ?? []).join(' ')}" -- "$cur") )`
    );
    lines.push('      return 0', '      ;;');
  }

  lines.push(
    '  esac',
    '',
    '  if [[ "$cur" == -* ]]; then',
    `    COMPREPLY=( $(compgen -W "${allFlags}" -- "$cur") )`,
    '    return 0',
    '  fi',
    '',
    `  COMPREPLY=( $(compgen -W "${commands.map((c) => c.name).join(' ')}" -f -- "$cur") )`,
    '}',
    '',
    `complete -o filenames -F ${fn} ${name}`,
    ''
  );
  return lines.join('\n');
}

function zshQuote(text: string): string {
  return text.replace(/'/g, "'\\''").replace(/([[\]:])/g, '\\$1');
}

function zshScript(
  name: string,
  options: OptionSpec[],
  commands: CommandSpec[]
): string {
  const specs = options.map((option) => {
    let action = '';
    if (option.takesValue) {
      const label = option.long.replace(/^--/, '');
      const completer = option.values
        ? `(${option.values.join(' ')})`
        : option.files
          ? '_files'
          : ' ';
      action = `:${label}:${completer}`;
    }
    const body = `[${zshQuote(option.description)}]${action}`;
    return option.short
      ? `    '(${option.short} ${option.long})'{${option.short},${option.long}}'${body}'`
      : `    '${option.long}${body}'`;
  });

  const commandList = commands
    .map((c) => `'${c.name}:${zshQuote(c.description)}'`)
    .join(' ');

  const lines: string[] = [
    `#compdef ${name}`,
    '',
    `_${name}() {`,
    '  local -a commands',
    `  commands=(${commandList})`,
    '',
    '  _arguments -s \\',
    ...specs.map((spec) => `${spec} \\`),
    "    '1: :->first' \\",
    "    '*:: :->rest'",
    '',
    '  case $state in',
    '    first)',
    "      _describe -t commands 'command' commands",
    '      _files',
    '      ;;',
    '    rest)',
    '      case $words[1] in',
  ];

  for (const command of commands.filter((c) => c.values)) {
    lines.push(
      `        ${command.name}) _values '${command.name}' ${(command.values ?? []).join(' ')} ;;`
    );
  }

  lines.push(
    '        *) _files ;;',
    '      esac',
    '      ;;',
    '  esac',
    '}',
    '',
    `_${name} "$@"`,
    ''
  );
  return lines.join('\n');
}

function fishQuote(text: string): string {
  return `'${text.replace(/\\/g, '\\\\').replace(/'/g, "\\'")}'`;
}

function fishScript(
  name: string,
  options: OptionSpec[],
  commands: CommandSpec[]
): string {
  const lines: string[] = [`# fish completion for ${name}`];

  for (const option of options) {
    const parts = [`complete -c ${name}`];
    if (option.short) parts.push(`-s ${option.short.replace(/^-/, '')}`);
    parts.push(`-l ${option.long.replace(/^--/, '')}`);
    parts.push(`-d ${fishQuote(option.description)}`);
    if (option.values) {
      parts.push(`-x -a ${fishQuote(option.values.join(' '))}`);
    } else if (option.files) {
      parts.push('-r -F');
    } else if (option.takesValue) {
      parts.push('-x');
    }
    lines.push(parts.join(' '));
  }

  for (const command of commands) {
    lines.push(
      `complete -c ${name} -n '__fish_use_subcommand' -a ${command.name} -d ${fishQuote(command.description)}`
    );
    if (command.values) {
      lines.push(
        `complete -c ${name} -n '__fish_seen_subcommand_from ${command.name}' -x -a ${fishQuote(command.values.join(' '))}`
      );
    }
  }

  lines.push('');
  return lines.join('\n');
}
