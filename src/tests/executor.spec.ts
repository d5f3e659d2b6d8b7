import { describe, it, expect } from 'vitest';
import { PlanExecutor, runPlan } from '../orchestrator/run.js';
import { executeStep, withTimeout } from '../orchestrator/step.js';
import { labelOutcomes } from '../orchestrator/aggregate.js';
import { RunLog } from '../orchestrator/log.js';
import { createBlackboard } from '../blackboard/index.js';
import { buildCalculatorRegistry, CompositeToolRegistry } from '../tools/registry.js';
import { InvalidPlanError } from '../errors.js';
import type { InvokeOptions, ToolProviderRegistry } from '../types/tools.js';
import type { StepOutcome } from '../types/plan.js';
import { FakeRegistry, call, lit, plan, ref, sleep } from './fakes.js';

describe('PlanExecutor scenarios', () => {
  it('SINGLE add(25, 37) yields 62', async () => {
    const result = await runPlan(
      plan('SINGLE', call(1, 'add', { parameters: { a: lit(25), b: lit(37) } })),
      { registry: buildCalculatorRegistry() }
    );
    expect(result.overallSuccess).toBe(true);
    expect(result.finalValue).toBe(62);
    expect(result.outcomes).toHaveLength(1);
    expect(result.outcomes[0]).toMatchObject({ step: 1, status: 'succeeded', success: true, value: 62, layer: 0 });
  });

  it('PARALLEL factorial(5) and sqrt(144) are labelled by tool name', async () => {
    const result = await runPlan(
      plan('PARALLEL',
        call(1, 'factorial', { parameters: { a: lit(5) } }),
        call(2, 'sqrt', { parameters: { a: lit(144) } })),
      { registry: buildCalculatorRegistry() }
    );
    expect(result.overallSuccess).toBe(true);
    expect(result.finalValue).toEqual({ factorial: 120, sqrt: 12 });
    expect(result.outcomes.map(o => o.success)).toEqual([true, true]);
  });

  it('SEQUENTIAL resolves the published difference into the next call', async () => {
    const result = await runPlan(
      plan('SEQUENTIAL',
        call(1, 'subtract', { parameters: { a: lit(100), b: lit(30) }, resultVariable: 'r1' }),
        call(2, 'add', { parameters: { a: ref('r1'), b: lit(15) }, dependency: 1 })),
      { registry: buildCalculatorRegistry() }
    );
    expect(result.outcomes[1].parameters).toEqual({ a: 70, b: 15 });
    expect(result.finalValue).toBe(85);
    expect(result.overallSuccess).toBe(true);
  });

  it('skips dependents of a failed call without invoking them', async () => {
    const registry = new FakeRegistry({
      search: () => { throw new Error('rate limited'); },
      power: () => 0,
      add: () => 0
    });
    const result = await runPlan(
      plan('SEQUENTIAL',
        call(1, 'search', { parameters: { query: lit('age of the oldest tree') }, resultVariable: 'age' }),
        call(2, 'power', { parameters: { a: lit(2), b: ref('age') }, dependency: 1, resultVariable: 'p' }),
        call(3, 'add', { parameters: { a: ref('p'), b: lit(1) }, dependency: 2 })),
      { registry }
    );
    expect(registry.invoked()).toEqual(['search']);
    expect(result.overallSuccess).toBe(false);
    expect(result.finalValue).toBeUndefined();
    expect(result.outcomes[0]).toMatchObject({ status: 'failed', errorKind: 'ToolExecutionError', message: 'rate limited' });
    expect(result.outcomes[1]).toMatchObject({
      status: 'skipped',
      success: false,
      errorKind: 'UpstreamFailure',
      message: 'depends on step 1, which did not succeed'
    });
    expect(result.outcomes[2]).toMatchObject({
      status: 'skipped',
      errorKind: 'UpstreamFailure',
      message: 'depends on step 2, which did not succeed'
    });
  });

  it('SEQUENTIAL still runs a call that does not depend on the failed one', async () => {
    const registry = new FakeRegistry({
      boom: () => { throw new Error('exploded'); },
      after: () => 1,
      ok: () => 5
    });
    const result = await runPlan(
      plan('SEQUENTIAL',
        call(1, 'boom'),
        call(2, 'after', { dependency: 1 }),
        call(3, 'ok')),
      { registry }
    );
    expect(registry.invoked()).toEqual(['boom', 'ok']);
    expect(result.outcomes.map(o => o.status)).toEqual(['failed', 'skipped', 'succeeded']);
    expect(result.outcomes[2]).toMatchObject({ success: true, value: 5 });
    expect(result.overallSuccess).toBe(false);
    expect(result.finalValue).toBeUndefined();
  });
});

describe('PlanExecutor strategies', () => {
  it('PARALLEL invokes each call once and orders outcomes by step', async () => {
    const registry = new FakeRegistry({
      slow: async () => { await sleep(40); return 's'; },
      fast: async () => { await sleep(1); return 'f'; },
      mid: async () => { await sleep(15); return 'm'; }
    });
    const result = await runPlan(
      plan('PARALLEL', call(1, 'slow'), call(2, 'fast'), call(3, 'mid')),
      { registry }
    );
    expect(registry.calls).toHaveLength(3);
    expect([...registry.invoked()].sort()).toEqual(['fast', 'mid', 'slow']);
    expect(result.outcomes.map(o => o.step)).toEqual([1, 2, 3]);
    expect(result.completionOrder).toEqual([2, 3, 1]);
    expect(result.finalValue).toEqual({ slow: 's', fast: 'f', mid: 'm' });
  });

  it('HYBRID waits for the whole layer before starting the next', async () => {
    const registry = new FakeRegistry({
      slow: async () => { await sleep(50); return 1; },
      fast: async () => { await sleep(1); return 2; },
      after: () => 3
    });
    const result = await runPlan(
      plan('HYBRID',
        call(1, 'slow'),
        call(2, 'fast', { resultVariable: 'f' }),
        call(3, 'after', { parameters: { x: ref('f') } })),
      { registry }
    );
    expect(registry.events).toEqual(['start:slow', 'start:fast', 'end:fast', 'end:slow', 'start:after', 'end:after']);
    expect(result.outcomes.map(o => o.layer)).toEqual([0, 0, 1]);
    expect(result.log).toContain('layer 0: steps 1, 2');
    expect(result.log).toContain('layer 1: steps 3');
    expect(result.finalValue).toEqual({ slow: 1, f: 2, after: 3 });
  });

  it('HYBRID keeps independent branches running after a failure', async () => {
    const registry = new FakeRegistry({
      boom: () => { throw new Error('exploded'); },
      ok: () => 7,
      use: () => 0,
      use2: (args) => Number(args.v) * 2
    });
    const result = await runPlan(
      plan('HYBRID',
        call(1, 'boom', { resultVariable: 'x' }),
        call(2, 'ok', { resultVariable: 'y' }),
        call(3, 'use', { parameters: { v: ref('x') } }),
        call(4, 'use2', { parameters: { v: ref('y') } })),
      { registry }
    );
    expect(registry.invoked()).toEqual(['boom', 'ok', 'use2']);
    expect(result.outcomes.map(o => o.status)).toEqual(['failed', 'succeeded', 'skipped', 'succeeded']);
    expect(result.completionOrder.slice(2)).toEqual([3, 4]);
    expect(result.overallSuccess).toBe(false);
    expect(result.finalValue).toEqual({
      x: { error: 'ToolExecutionError', message: 'exploded' },
      y: 7,
      use: { error: 'UpstreamFailure', message: 'depends on step 1, which did not succeed' },
      use2: 14
    });
  });

  it('caps simultaneous calls with maxConcurrency', async () => {
    let active = 0;
    let peak = 0;
    const registry = new FakeRegistry({
      work: async () => {
        active++;
        peak = Math.max(peak, active);
        await sleep(10);
        active--;
        return 'done';
      }
    });
    const result = await runPlan(
      plan('PARALLEL', call(1, 'work'), call(2, 'work'), call(3, 'work'), call(4, 'work')),
      { registry, maxConcurrency: 2 }
    );
    expect(peak).toBe(2);
    expect(registry.calls).toHaveLength(4);
    expect(result.finalValue).toEqual({ work: 'done', step_2_work: 'done', step_3_work: 'done', step_4_work: 'done' });
  });

  it('lets the first provider listing a tool serve it', async () => {
    const first = new FakeRegistry({ add: () => 'from-first' }, 'first');
    const second = new FakeRegistry({ add: () => 'from-second' }, 'second');
    const result = await runPlan(
      plan('SINGLE', call(1, 'add')),
      { registry: new CompositeToolRegistry([first, second]) }
    );
    expect(result.finalValue).toBe('from-first');
    expect(second.calls).toHaveLength(0);
  });
});

describe('PlanExecutor failures', () => {
  it('rejects a cyclic plan before any tool is touched', async () => {
    const registry = new FakeRegistry({ add: () => 0 });
    const cyclic = plan('SEQUENTIAL',
      call(2, 'add', { dependency: 3, resultVariable: 'result_of_step_2' }),
      call(3, 'add', { parameters: { a: ref('result_of_step_2') } }));
    const run = new PlanExecutor({ registry }).execute(cyclic);
    await expect(run).rejects.toBeInstanceOf(InvalidPlanError);
    await expect(run).rejects.toMatchObject({ kind: 'InvalidPlan', issues: ['dependency cycle: 2 -> 3 -> 2'] });
    expect(registry.calls).toHaveLength(0);
    expect(registry.listed).toBe(0);
  });

  it('reports a tool no provider exposes as UnknownTool', async () => {
    const result = await runPlan(plan('SINGLE', call(1, 'nope')), { registry: new FakeRegistry({}) });
    expect(result.outcomes[0]).toMatchObject({
      status: 'failed',
      errorKind: 'UnknownTool',
      message: "No provider exposes tool 'nope'"
    });
    expect(result.overallSuccess).toBe(false);
  });

  it('times out a slow call and aborts its signal', async () => {
    const seen: { signal?: AbortSignal } = {};
    const registry = new FakeRegistry({
      hang: (_args, opts) => new Promise(resolve => {
        seen.signal = opts.signal;
        opts.signal?.addEventListener('abort', () => resolve('late'));
      })
    });
    const result = await runPlan(plan('SINGLE', call(1, 'hang')), { registry, toolTimeoutMs: 20 });
    expect(result.outcomes[0]).toMatchObject({
      status: 'failed',
      errorKind: 'Timeout',
      message: 'Tool hang timed out after 20ms'
    });
    expect(seen.signal?.aborted).toBe(true);
  });

  it('maps a provider that throws to ToolExecutionError', async () => {
    const registry: ToolProviderRegistry = {
      listTools: async () => [{ toolName: 'flaky', providerId: 'p', description: '' }],
      invoke: async () => { throw new Error('connection reset'); }
    };
    const result = await runPlan(plan('SINGLE', call(1, 'flaky')), { registry });
    expect(result.outcomes[0]).toMatchObject({ errorKind: 'ToolExecutionError', message: 'connection reset' });
  });

  it('cancels calls not started when the plan deadline passes', async () => {
    const registry = new FakeRegistry({
      slow: async () => { await sleep(80); return 1; },
      next: () => 2
    });
    const result = await runPlan(
      plan('SEQUENTIAL',
        call(1, 'slow', { resultVariable: 'a' }),
        call(2, 'next', { parameters: { v: ref('a') } })),
      { registry, planTimeoutMs: 20 }
    );
    expect(registry.invoked()).toEqual(['slow']);
    expect(result.outcomes[0]).toMatchObject({
      status: 'failed',
      errorKind: 'Timeout',
      message: 'plan deadline passed while the call was in flight'
    });
    expect(result.outcomes[1]).toMatchObject({ status: 'cancelled', errorKind: 'Cancelled' });
    expect(result.completionOrder).toEqual([1, 2]);
    expect(result.log).toContain('plan deadline passed; pending calls cancelled');
  });

  it('records an execution log', async () => {
    const result = await runPlan(
      plan('SINGLE', call(1, 'add', { parameters: { a: lit(25), b: lit(37) } })),
      { registry: buildCalculatorRegistry() }
    );
    expect(result.log[0]).toBe('SINGLE plan with 1 call(s) in 1 group(s)');
    expect(result.log[1]).toMatch(/^step 1 add succeeded in \d+ms: 62$/);
    expect(result.log[2]).toMatch(/^plan completed: 1\/1 succeeded in \d+ms$/);
  });
});

describe('PlanExecutor provider trouble', () => {
  const broken: ToolProviderRegistry = {
    listTools: async () => { throw new Error('connection closed'); },
    invoke: async () => { throw new Error('connection closed'); }
  };

  it('serves tools from the providers that could be listed', async () => {
    const good = new FakeRegistry({ add: () => 62 }, 'good');
    const result = await runPlan(
      plan('SINGLE', call(1, 'add', { parameters: { a: lit(25), b: lit(37) } })),
      { registry: new CompositeToolRegistry([good, broken]) }
    );
    expect(result.overallSuccess).toBe(true);
    expect(result.finalValue).toBe(62);
  });

  it('reports tools of an unlisted provider as UnknownTool', async () => {
    const good = new FakeRegistry({ add: () => 62 }, 'good');
    const result = await runPlan(
      plan('PARALLEL', call(1, 'add'), call(2, 'search')),
      { registry: new CompositeToolRegistry([broken, good]) }
    );
    expect(result.outcomes[0]).toMatchObject({ status: 'succeeded', value: 62 });
    expect(result.outcomes[1]).toMatchObject({
      status: 'failed',
      errorKind: 'UnknownTool',
      message: "No provider exposes tool 'search'"
    });
  });

  it('settles every call when the only registry cannot list its tools', async () => {
    const result = await runPlan(plan('SINGLE', call(1, 'add')), { registry: broken });
    expect(result.outcomes[0]).toMatchObject({ status: 'failed', errorKind: 'UnknownTool' });
    expect(result.overallSuccess).toBe(false);
    expect(result.log).toContain('tool listing failed: connection closed');
  });

  it('keeps declared literals intact when a provider mutates its arguments', async () => {
    const registry = new FakeRegistry({
      append: args => {
        const xs = args.xs;
        if (Array.isArray(xs)) xs.push(99);
        return xs;
      }
    });
    const p = plan('SINGLE', call(1, 'append', { parameters: { xs: lit([1, 2]) } }));
    const result = await runPlan(p, { registry });
    expect(result.finalValue).toEqual([1, 2, 99]);
    expect(p.calls[0].parameters.xs).toEqual({ kind: 'literal', value: [1, 2] });
  });
});

describe('executeStep', () => {
  it('fails with UnresolvedVariable and never invokes when a variable is missing', async () => {
    const registry = new FakeRegistry({ add: () => 1 });
    const outcome = await executeStep(call(4, 'add', { parameters: { a: ref('ghost') } }), 0, {
      registry,
      toolIndex: new Map([['add', { toolName: 'add', providerId: 'fake', description: '' }]]),
      blackboard: createBlackboard(),
      toolTimeoutMs: 1000,
      log: new RunLog()
    });
    expect(outcome).toMatchObject({
      step: 4,
      status: 'failed',
      errorKind: 'UnresolvedVariable',
      message: "Variable 'ghost' has no published value"
    });
    expect(registry.calls).toHaveLength(0);
  });

  it('passes the per-call timeout to the provider', async () => {
    const seen: InvokeOptions[] = [];
    const registry = new FakeRegistry({ echo: (_args, opts) => { seen.push(opts); return 'ok'; } });
    await runPlan(plan('SINGLE', call(1, 'echo')), { registry, toolTimeoutMs: 1234 });
    expect(seen.map(o => o.timeoutMs)).toEqual([1234]);
  });
});

describe('withTimeout', () => {
  it('waits out a delay longer than a timer can hold', async () => {
    await expect(withTimeout(sleep(5).then(() => 'ok'), 3_000_000_000, () => new Error('timed out'))).resolves.toBe('ok');
  });
});

describe('labelOutcomes', () => {
  const done = (step: number, toolName: string, value: unknown): StepOutcome =>
    ({ step, toolName, status: 'succeeded', success: true, value, durationMs: 0, layer: 0 });

  it('labels tools named like object members by their own name', () => {
    const out = labelOutcomes([done(1, 'constructor', 'x'), done(2, 'toString', 'y')]);
    expect(Object.keys(out)).toEqual(['constructor', 'toString']);
    expect(out.constructor).toBe('x');
    expect(out.toString).toBe('y');
  });
});
