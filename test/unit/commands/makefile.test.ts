/**
 * Makefile Rendering Tests
 *
 * Tests:
 * - Shell quoting of command arguments
 * - Escaping of make's `$`
 * - Layout: header, .PHONY, all, one block per rule
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';

import { quoteArgument, escapeForMake, renderCommand, renderMakefile, type Rule } from '@bitforge/core';

function rule(command: string[], targets: string[], dependencies: string[], phony = false): Rule {
  return { command, targets, dependencies, phony };
}

describe('quoteArgument', () => {
  it('should leave plain arguments alone', () => {
    assert.strictEqual(quoteArgument('top.v'), 'top.v');
    assert.strictEqual(quoteArgument('--package'), '--package');
    assert.strictEqual(quoteArgument('src/rtl/top.v'), 'src/rtl/top.v');
    assert.strictEqual(quoteArgument('key=value,x@y:z%'), 'key=value,x@y:z%');
  });

  it('should single-quote arguments with spaces', () => {
    assert.strictEqual(quoteArgument('synth_ice40 -top top'), "'synth_ice40 -top top'");
  });

  it('should escape embedded single quotes', () => {
    assert.strictEqual(quoteArgument("it's"), "'it'\\''s'");
  });

  it('should quote the empty string', () => {
    assert.strictEqual(quoteArgument(''), "''");
  });
});

describe('escapeForMake', () => {
  it('should double every dollar sign', () => {
    assert.strictEqual(escapeForMake('$HOME/$(X)'), '$$HOME/$$(X)');
    assert.strictEqual(escapeForMake('plain'), 'plain');
  });
});

describe('renderCommand', () => {
  it('should quote for the shell and then escape for make', () => {
    assert.strictEqual(renderCommand(['echo', '$x', 'a b']), "echo '$$x' 'a b'");
  });
});

describe('renderMakefile', () => {
  it('should lay out header, phony list, default and rules', () => {
    const text = renderMakefile({
      rules: [
        rule(['tool', 'in.v', '-o', 'out.bit'], ['out.bit'], ['in.v']),
        rule([], ['synth'], ['out.bit'], true),
        rule(['prog', 'out.bit'], ['pgm'], ['out.bit'], true),
      ],
      defaultTarget: 'out.bit',
      version: '1.2.3',
      launcher: 'RUN',
    });

    assert.strictEqual(
      text,
      [
        '# Generated by bitforge 1.2.3. Do not edit.',
        '',
        '.PHONY: all synth pgm',
        '',
        'all: out.bit',
        '',
        'out.bit: in.v',
        '\t$(RUN) tool in.v -o out.bit',
        '',
        'synth: out.bit',
        '',
        'pgm: out.bit',
        '\t$(RUN) prog out.bit',
        '',
      ].join('\n')
    );
  });

  it('should render a rule without dependencies as a bare target line', () => {
    const text = renderMakefile({
      rules: [rule(['touch', 'stamp'], ['stamp'], [])],
      defaultTarget: 'stamp',
      version: '0.0.0',
      launcher: 'L',
    });
    assert.ok(text.endsWith('\nstamp:\n\t$(L) touch stamp\n'));
  });

  it('should list multi-target rules on one line and each phony target once', () => {
    const text = renderMakefile({
      rules: [rule([], ['synth', 'netlist'], ['a.edif'], true), rule([], ['synth', 'netlist'], ['b.edif'], true)],
      defaultTarget: 'synth',
      version: '0.0.0',
      launcher: 'L',
    });
    const lines = text.split('\n');
    assert.strictEqual(lines[2], '.PHONY: all synth netlist');
    assert.strictEqual(lines[6], 'synth netlist: a.edif');
  });
});
