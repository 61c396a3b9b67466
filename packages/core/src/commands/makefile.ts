/**
 * Makefile rendering for the command graph.
 *
 * Layout:
 *
 *   # Generated by bitforge <version>. Do not edit.
 *
 *   .PHONY: all <virtual targets>
 *
 *   all: <default target>
 *
 *   <targets>: <dependencies>
 *   <TAB>$(<LAUNCHER>) <command>
 *
 * Commands are quoted for /bin/sh and then escaped for make.
 */

import type { Rule } from '@bitforge/types';

export interface MakefileInput {
  rules: readonly Rule[];
  defaultTarget: string;
  version: string;
  /** Make variable prefixed to every command, e.g. a job launcher */
  launcher: string;
}

const SAFE_ARGUMENT = /^[A-Za-z0-9_+=.,/@%:-]+$/;

/**
 * Single-quote an argument unless it is made only of shell-inert characters.
 */
export function quoteArgument(arg: string): string {
  if (SAFE_ARGUMENT.test(arg)) return arg;
  return `'${arg.replace(/'/g, `'\\''`)}'`;
}

/** `$` is make's expansion character */
export function escapeForMake(text: string): string {
  return text.replace(/\$/g, '$$$$');
}

export function renderCommand(command: readonly string[]): string {
  return escapeForMake(command.map(quoteArgument).join(' '));
}

export function renderMakefile(input: MakefileInput): string {
  const phony = ['all'];
  for (const rule of input.rules) {
    if (!rule.phony) continue;
    for (const target of rule.targets) {
      if (!phony.includes(target)) phony.push(target);
    }
  }

  const lines: string[] = [
    `# Generated by bitforge ${input.version}. Do not edit.`,
    '',
    `.PHONY: ${phony.join(' ')}`,
    '',
    `all: ${input.defaultTarget}`,
  ];

  for (const rule of input.rules) {
    lines.push('');
    lines.push(`${[rule.targets.join(' ') + ':', ...rule.dependencies].join(' ')}`);
    if (rule.command.length > 0) {
      lines.push(`\t$(${input.launcher}) ${renderCommand(rule.command)}`);
    }
  }

  return lines.join('\n') + '\n';
}
