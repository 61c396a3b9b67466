/**
 * FlowGraphBuilder Tests
 *
 * Tests:
 * - Stages are instantiated in topological order with predecessor outputs as inputs
 * - Elided stages are dropped; a project file can stand in for their output
 * - A missing input fails with ERR_MISSING_PREDECESSOR_OUTPUT
 * - Options are layered: global, descriptor overrides, tool options
 * - Layered options are checked against the variant's option table
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';

import {
  FlowGraphBuilder,
  StageCatalog,
  ConsoleLogger,
  FlowError,
  StageError,
  resolveOptions,
  matchesRequirement,
  type Artifact,
  type ArtifactRequirement,
  type ProjectMetadata,
  type StageContext,
  type StageDescriptor,
  type StageVariant,
} from '@bitforge/core';

// =============================================================================
// Test Helpers
// =============================================================================

function fakeVariant(
  id: string,
  consumes: ArtifactRequirement[],
  produces: (ctx: StageContext) => Artifact[]
): StageVariant {
  return {
    id,
    description: `fake ${id}`,
    options: {},
    consumes: () => consumes,
    produces,
    configure: () => ({ rules: [] }),
  };
}

const synthesize = fakeVariant('synthesize', [], (ctx) => [{ name: `${ctx.project.name}.edif`, fileType: 'edif' }]);
const placeRoute = fakeVariant('place_route', [{ fileType: 'edif' }], (ctx) => [
  { name: `${ctx.project.name}.bit`, fileType: 'bitstream' },
]);

// Declared in reverse to show the builder orders them itself
const DESCRIPTORS: StageDescriptor[] = [
  { toolId: 'place_route', successors: [], optionOverrides: {} },
  { toolId: 'synthesize', successors: ['place_route'], optionOverrides: { arch: 'xilinx' } },
];

function makeProject(overrides: Partial<ProjectMetadata> = {}): ProjectMetadata {
  return {
    name: 'top',
    files: [{ name: 'top.v', fileType: 'verilogSource' }],
    options: {},
    ...overrides,
  };
}

function makeBuilder(variants: StageVariant[] = [synthesize, placeRoute]): FlowGraphBuilder {
  return new FlowGraphBuilder({ catalog: new StageCatalog(variants), logger: new ConsoleLogger('silent') });
}

function expectFlowError(fn: () => unknown, code: string): FlowError {
  let caught: unknown;
  try {
    fn();
  } catch (error) {
    caught = error;
  }
  assert.ok(caught instanceof FlowError, 'expected a FlowError');
  assert.strictEqual(caught.code, code);
  return caught;
}

// =============================================================================
// TESTS
// =============================================================================

describe('FlowGraphBuilder', () => {
  it('should instantiate stages in topological order', () => {
    const graph = makeBuilder().build(DESCRIPTORS, makeProject(), { flow: 'demo' });

    assert.strictEqual(graph.name, 'top');
    assert.strictEqual(graph.flow, 'demo');
    assert.deepStrictEqual(
      graph.stages.map((s) => s.toolId),
      ['synthesize', 'place_route']
    );
    assert.deepStrictEqual(graph.elided, []);
  });

  it('should feed predecessor outputs to successors', () => {
    const graph = makeBuilder().build(DESCRIPTORS, makeProject(), { flow: 'demo' });
    const [synth, pnr] = graph.stages;

    assert.deepStrictEqual(synth.inputs, []);
    assert.deepStrictEqual(synth.outputs, [{ name: 'top.edif', fileType: 'edif' }]);
    assert.deepStrictEqual(synth.successors, ['place_route']);
    assert.deepStrictEqual(pnr.predecessors, ['synthesize']);
    assert.deepStrictEqual(pnr.inputs, [{ name: 'top.edif', fileType: 'edif' }]);
    assert.deepStrictEqual(pnr.outputs, [{ name: 'top.bit', fileType: 'bitstream' }]);
  });

  it('should freeze the graph', () => {
    const graph = makeBuilder().build(DESCRIPTORS, makeProject(), { flow: 'demo' });
    assert.strictEqual(Object.isFrozen(graph), true);
    assert.strictEqual(Object.isFrozen(graph.stages), true);
    assert.strictEqual(Object.isFrozen(graph.stages[1].inputs), true);
  });

  // ===========================================================================
  // Elision
  // ===========================================================================

  describe('elision', () => {
    it('should bind an external file in place of the elided output', () => {
      const project = makeProject({ files: [{ name: 'top.edif', fileType: 'edif' }] });
      const graph = makeBuilder().build(DESCRIPTORS, project, { flow: 'demo', elide: ['synthesize'] });

      assert.deepStrictEqual(
        graph.stages.map((s) => s.toolId),
        ['place_route']
      );
      assert.deepStrictEqual(graph.elided, ['synthesize']);
      assert.deepStrictEqual(graph.stages[0].predecessors, []);
      assert.deepStrictEqual(graph.stages[0].inputs, [{ name: 'top.edif', fileType: 'edif' }]);
    });

    it('should drop elided stages from successor lists', () => {
      const descriptors: StageDescriptor[] = [
        { toolId: 'synthesize', successors: ['lint', 'place_route'], optionOverrides: {} },
        { toolId: 'lint', successors: [], optionOverrides: {} },
        { toolId: 'place_route', successors: [], optionOverrides: {} },
      ];
      const lint = fakeVariant('lint', [], () => []);
      const graph = makeBuilder([synthesize, lint, placeRoute]).build(descriptors, makeProject(), {
        flow: 'demo',
        elide: ['lint'],
      });
      assert.deepStrictEqual(graph.stages[0].successors, ['place_route']);
    });

    it('should fail when nothing supplies the elided output', () => {
      const error = expectFlowError(
        () => makeBuilder().build(DESCRIPTORS, makeProject(), { flow: 'demo', elide: ['synthesize'] }),
        'ERR_MISSING_PREDECESSOR_OUTPUT'
      );
      assert.strictEqual(error.context.flow, 'demo');
      assert.strictEqual(error.context.stage, 'place_route');
      assert.strictEqual(error.context.fileType, 'edif');
      assert.deepStrictEqual(error.context.elided, ['synthesize']);
      assert.strictEqual(error.suggestion, 'Add the file to the project or keep synthesize in the flow');
    });

    it('should match a named requirement by name as well as type', () => {
      const consumer = fakeVariant('place_route', [{ fileType: 'edif', name: 'core.edif' }], () => []);
      const project = makeProject({ files: [{ name: 'top.edif', fileType: 'edif' }] });
      const error = expectFlowError(
        () => makeBuilder([synthesize, consumer]).build(DESCRIPTORS, project, { flow: 'demo', elide: ['synthesize'] }),
        'ERR_MISSING_PREDECESSOR_OUTPUT'
      );
      assert.strictEqual(error.context.artifact, 'core.edif');
    });

    it('should reject eliding a stage the flow does not have', () => {
      const error = expectFlowError(
        () => makeBuilder().build(DESCRIPTORS, makeProject(), { flow: 'demo', elide: ['ghost'] }),
        'ERR_INVALID_FLOW'
      );
      assert.strictEqual(error.context.stage, 'ghost');
    });
  });

  // ===========================================================================
  // Failures and options
  // ===========================================================================

  it('should fail on a tool with no registered variant', () => {
    const error = expectFlowError(
      () => makeBuilder([placeRoute]).build(DESCRIPTORS, makeProject(), { flow: 'demo' }),
      'ERR_UNKNOWN_TOOL'
    );
    assert.strictEqual(error.context.stage, 'synthesize');
  });

  it('should fail on cyclic descriptors', () => {
    const cyclic: StageDescriptor[] = [
      { toolId: 'synthesize', successors: ['place_route'], optionOverrides: {} },
      { toolId: 'place_route', successors: ['synthesize'], optionOverrides: {} },
    ];
    expectFlowError(() => makeBuilder().build(cyclic, makeProject(), { flow: 'demo' }), 'ERR_CYCLE_DETECTED');
  });

  it('should layer options on each stage', () => {
    const project = makeProject({
      options: { arch: 'generic', part: 'xc6slx9' },
      toolOptions: { place_route: { part: 'xc6slx16' } },
    });
    const graph = makeBuilder().build(DESCRIPTORS, project, { flow: 'demo' });
    assert.deepStrictEqual(graph.stages[0].options, { arch: 'xilinx', part: 'xc6slx9' });
    assert.deepStrictEqual(graph.stages[1].options, { arch: 'generic', part: 'xc6slx16' });
  });

  describe('option tables', () => {
    const tuned: StageVariant = {
      ...placeRoute,
      options: {
        effort: { type: 'integer', description: 'effort level' },
        mode: { type: 'string', description: 'routing mode', values: ['timing', 'area'] },
      },
    };

    function expectInvalidOption(project: ProjectMetadata): StageError {
      let caught: unknown;
      try {
        makeBuilder([synthesize, tuned]).build(DESCRIPTORS, project, { flow: 'demo' });
      } catch (error) {
        caught = error;
      }
      assert.ok(caught instanceof StageError, 'expected a StageError');
      assert.strictEqual(caught.code, 'ERR_INVALID_OPTION');
      return caught;
    }

    it('should reject a value of the wrong type', () => {
      const error = expectInvalidOption(makeProject({ toolOptions: { place_route: { effort: 'high' } } }));
      assert.strictEqual(error.message, 'Option "effort" of stage "place_route" must be an integer, got "high"');
      assert.strictEqual(error.context.stage, 'place_route');
    });

    it('should reject a value outside the documented choices', () => {
      const error = expectInvalidOption(makeProject({ options: { mode: 'power' } }));
      assert.strictEqual(error.message, 'Option "mode" of stage "place_route" must be one of timing, area, got "power"');
    });

    it('should accept documented values and leave undocumented keys alone', () => {
      const project = makeProject({ options: { mode: 'area', seed: [1, 2] }, toolOptions: { place_route: { effort: 3 } } });
      const graph = makeBuilder([synthesize, tuned]).build(DESCRIPTORS, project, { flow: 'demo' });
      assert.deepStrictEqual(graph.stages[1].options, { mode: 'area', seed: [1, 2], effort: 3 });
    });
  });
});

describe('resolveOptions', () => {
  it('should let tool options win over overrides and overrides over globals', () => {
    const descriptor: StageDescriptor = { toolId: 'yosys', successors: [], optionOverrides: { arch: 'ice40' } };
    const base = makeProject({ options: { arch: 'xilinx', synth: 'yosys' } });
    assert.deepStrictEqual(resolveOptions(descriptor, base), { arch: 'ice40', synth: 'yosys' });
    assert.deepStrictEqual(resolveOptions(descriptor, { ...base, toolOptions: { yosys: { arch: 'ecp5' } } }), {
      arch: 'ecp5',
      synth: 'yosys',
    });
  });
});

describe('matchesRequirement', () => {
  it('should match on type, and on name only when one is asked for', () => {
    const edif = { name: 'top.edif', fileType: 'edif' };
    assert.strictEqual(matchesRequirement(edif, { fileType: 'edif' }), true);
    assert.strictEqual(matchesRequirement(edif, { fileType: 'edif', name: 'top.edif' }), true);
    assert.strictEqual(matchesRequirement(edif, { fileType: 'edif', name: 'core.edif' }), false);
    assert.strictEqual(matchesRequirement(edif, { fileType: 'blif' }), false);
  });
});
