import { describe, expect, it } from 'vitest';
import { type Config, defaultConfig } from '../parser/config-schema.ts';
import { WorkflowParser } from '../parser/workflow-parser.ts';
import { InputValidationError } from '../utils/errors.ts';
import { SilentLogger } from '../utils/logger.ts';
import { echoHandler, type FakeServices, fakeServices, nextEvent, recordEvents } from './__test__/fakes.ts';
import { type DebugEvent, DebugSession, describeState } from './debug-session.ts';

const demo = WorkflowParser.parse(`
id: demo
name: Demo
arguments:
  - name: greeting
    default: hello
steps:
  - id: first
    name: First
    command: echo a
    output_variable: a
  - id: second
    name: Second
    command: echo {{greeting}}
    output_variable: b
  - id: third
    name: Third
    command: echo c
`);

const single = WorkflowParser.parse(`
id: single
name: Single
steps:
  - id: only
    name: Only
    command: echo only
`);

const config: Config = { ...defaultConfig(), retry: { base_delay_ms: 0 } };

/**
 * Services whose first command stays open until released
 */
function heldFirstCommand(): { services: FakeServices; started: Promise<void>; release: () => void } {
  let release = (): void => {};
  let markStarted = (): void => {};
  const started = new Promise<void>((resolve) => {
    markStarted = resolve;
  });
  const gate = new Promise<void>((resolve) => {
    release = resolve;
  });
  let calls = 0;
  const services = fakeServices({
    handler: async (request) => {
      calls++;
      if (calls === 1) {
        markStarted();
        await gate;
      }
      return echoHandler(request);
    },
  });
  return { services, started, release };
}

function createSession(
  options: { breakpoints?: number[]; services?: FakeServices } = {}
): { session: DebugSession; services: FakeServices } {
  const services = options.services ?? fakeServices();
  const session = new DebugSession(demo, {}, {
    id: 'session-1',
    config,
    logger: new SilentLogger(),
    services,
    breakpoints: options.breakpoints,
  });
  return { session, services };
}

describe('DebugSession', () => {
  it('runs every step when there are no breakpoints', async () => {
    const { session, services } = createSession();
    const events = recordEvents<DebugEvent>(session);

    session.send({ type: 'start' });
    await session.done();

    expect(session.state).toEqual({ kind: 'completed' });
    expect(session.history().map((record) => record.status)).toEqual(['completed', 'completed', 'completed']);
    expect(services.processRunner.commands).toEqual(['echo a', 'echo hello', 'echo c']);
    expect(events[0]?.type).toBe('debug.session_started');
    expect(events.at(-1)?.type).toBe('debug.completed');
  });

  it('pauses before a breakpoint step with the snapshot later recorded for it', async () => {
    const { session, services } = createSession({ breakpoints: [1] });
    const hit = nextEvent(session, 'debug.breakpoint_hit');

    session.start();
    const event = await hit;

    expect(event.stepIndex).toBe(1);
    expect(event.stepId).toBe('second');
    expect(event.reason).toBe('breakpoint');
    expect(event.variables).toEqual({ greeting: 'hello', a: 'a\n' });
    expect(session.state).toEqual({ kind: 'step_breakpoint' });
    expect(services.processRunner.commands).toEqual(['echo a']);

    session.resume();
    await session.done();

    expect(session.state).toEqual({ kind: 'completed' });
    expect(session.history()).toHaveLength(3);
    expect(session.historyAt(1)?.variablesBefore).toEqual(event.variables);
    expect(session.variablesAt(1)).toEqual(event.variables);
    expect(services.processRunner.commands).toEqual(['echo a', 'echo hello', 'echo c']);
  });

  it('executes exactly one step on step-over, then breaks again', async () => {
    const { session, services } = createSession({ breakpoints: [0] });
    const first = nextEvent(session, 'debug.breakpoint_hit');
    session.start();
    await first;
    expect(services.processRunner.commands).toEqual([]);

    const second = nextEvent(session, 'debug.breakpoint_hit');
    session.send({ type: 'step_over' });
    const event = await second;

    expect(event.stepIndex).toBe(1);
    expect(event.reason).toBe('step');
    expect(services.processRunner.commands).toEqual(['echo a']);

    const third = nextEvent(session, 'debug.breakpoint_hit');
    session.send({ type: 'step_into' });
    expect((await third).stepIndex).toBe(2);

    session.resume();
    await session.done();
    expect(session.history()).toHaveLength(3);
  });

  it('stops at a breakpoint without running further steps or emitting more events', async () => {
    const { session, services } = createSession({ breakpoints: [1] });
    const events = recordEvents<DebugEvent>(session);
    const hit = nextEvent(session, 'debug.breakpoint_hit');
    session.start();
    await hit;

    session.stop();
    await session.done();
    session.resume();
    session.restart();

    expect(session.state).toEqual({ kind: 'stopped' });
    expect(services.processRunner.commands).toEqual(['echo a']);
    expect(session.history()).toHaveLength(1);
    expect(events.at(-1)).toMatchObject({ type: 'debug.stopped', stepIndex: 1 });
  });

  it('applies variable edits to the following steps', async () => {
    const { session, services } = createSession({ breakpoints: [1] });
    const events = recordEvents<DebugEvent>(session);
    const hit = nextEvent(session, 'debug.breakpoint_hit');
    session.start();
    await hit;

    session.setVariable('greeting', 'hola');
    session.resume();
    await session.done();

    expect(services.processRunner.commands).toEqual(['echo a', 'echo hola', 'echo c']);
    expect(session.currentVariables()).toMatchObject({ greeting: 'hola', b: 'hola\n' });
    expect(events.filter((event) => event.type === 'debug.variable_updated')).toHaveLength(1);
  });

  it('pauses between steps and continues on resume', async () => {
    const { session, services } = createSession();
    const paused = nextEvent(session, 'debug.paused');

    session.pause();
    session.start();
    const event = await paused;

    expect(event.stepIndex).toBe(0);
    expect(session.state).toEqual({ kind: 'paused' });
    expect(services.processRunner.commands).toEqual([]);

    session.resume();
    await session.done();
    expect(session.state).toEqual({ kind: 'completed' });
  });

  it('still breaks on the current step after resuming from a pause', async () => {
    const { session, services } = createSession({ breakpoints: [0] });
    const events = recordEvents<DebugEvent>(session);
    const paused = nextEvent(session, 'debug.paused');

    session.pause();
    session.start();
    await paused;

    const hit = nextEvent(session, 'debug.breakpoint_hit');
    session.resume();
    const event = await hit;

    expect(event).toMatchObject({ stepIndex: 0, stepId: 'first', reason: 'breakpoint' });
    expect(session.state).toEqual({ kind: 'step_breakpoint' });
    expect(services.processRunner.commands).toEqual([]);
    expect(events.map((event) => event.type).filter((type) => type.startsWith('debug.'))).toEqual([
      'debug.session_started',
      'debug.paused',
      'debug.resumed',
      'debug.breakpoint_hit',
    ]);

    session.resume();
    await session.done();
    expect(session.state).toEqual({ kind: 'completed' });
    expect(services.processRunner.commands).toEqual(['echo a', 'echo hello', 'echo c']);
  });

  it('honors a restart sent while the last step runs', async () => {
    const { services, started, release } = heldFirstCommand();
    const session = new DebugSession(single, {}, { id: 'session-2', config, logger: new SilentLogger(), services });
    const events = recordEvents<DebugEvent>(session);

    session.start();
    await started;
    session.restart();
    release();
    await session.done();

    expect(session.state).toEqual({ kind: 'completed' });
    expect(services.processRunner.commands).toEqual(['echo only', 'echo only']);
    expect(session.history()).toHaveLength(1);
    const control = events.map((event) => event.type).filter((type) => type.startsWith('debug.'));
    expect(control).toEqual(['debug.session_started', 'debug.restarted', 'debug.completed']);
  });

  it('honors a stop sent while the last step runs', async () => {
    const { services, started, release } = heldFirstCommand();
    const session = new DebugSession(single, {}, { id: 'session-3', config, logger: new SilentLogger(), services });
    const events = recordEvents<DebugEvent>(session);

    session.start();
    await started;
    session.stop();
    release();
    await session.done();

    expect(session.state).toEqual({ kind: 'stopped' });
    expect(services.processRunner.commands).toEqual(['echo only']);
    expect(events.map((event) => event.type)).not.toContain('debug.completed');
    expect(events.at(-1)).toMatchObject({ type: 'debug.stopped', stepIndex: 1 });
    expect(session.summary()).toBe('Workflow: Single | Steps: 1/1 | Failed: 0 | State: Stopped');
  });

  it('ends in a failed state on the first failing step', async () => {
    const services = fakeServices({
      handler: (request) =>
        request.executable === 'echo hello'
          ? { output: 'boom\n', exitCode: 3, truncated: false }
          : { output: 'ok\n', exitCode: 0, truncated: false },
    });
    const { session } = createSession({ services });
    const failed = nextEvent(session, 'debug.failed');

    session.start();
    const event = await failed;
    await session.done();

    expect(event).toMatchObject({ stepIndex: 1, stepId: 'second', reason: 'Command exited with code 3: boom' });
    expect(session.state).toEqual({ kind: 'failed', reason: 'Command exited with code 3: boom' });
    expect(session.history()).toHaveLength(2);
    expect(services.processRunner.requests).toHaveLength(2);
    expect(session.summary()).toBe(
      'Workflow: Demo | Steps: 1/3 | Failed: 1 | State: Failed(Command exited with code 3: boom)'
    );
  });

  it('restarts from the initial state and keeps breakpoints', async () => {
    const { session, services } = createSession({ breakpoints: [1] });
    const firstHit = nextEvent(session, 'debug.breakpoint_hit');
    session.start();
    const before = await firstHit;

    session.setVariable('greeting', 'changed');
    const restarted = nextEvent(session, 'debug.restarted');
    const secondHit = nextEvent(session, 'debug.breakpoint_hit');
    session.restart();
    await restarted;
    const after = await secondHit;

    expect(after.stepIndex).toBe(1);
    expect(after.variables).toEqual(before.variables);
    expect(session.history()).toHaveLength(1);
    expect(services.processRunner.commands).toEqual(['echo a', 'echo a']);

    session.stop();
    await session.done();
  });

  it('runs again after completion on restart', async () => {
    const { session, services } = createSession();
    session.start();
    await session.done();

    session.restart();
    await session.done();

    expect(session.state).toEqual({ kind: 'completed' });
    expect(session.history()).toHaveLength(3);
    expect(services.processRunner.requests).toHaveLength(6);
  });

  it('tracks breakpoint edits before the session starts', () => {
    const { session } = createSession();
    session.setBreakpoint(2);
    session.setBreakpoint(0);
    session.setBreakpoint(2);
    session.removeBreakpoint(0);
    session.setBreakpoint(-1);

    const snapshot = session.snapshot();
    expect(snapshot.breakpoints).toEqual([2]);
    expect(snapshot.state).toEqual({ kind: 'not_started' });
    expect(snapshot.variables).toEqual({ greeting: 'hello' });
    expect(session.summary()).toBe('Workflow: Demo | Steps: 0/3 | Failed: 0 | State: NotStarted');
  });

  it('rejects inputs the workflow does not declare', () => {
    expect(() => new DebugSession(demo, { gretting: 'x' }, { logger: new SilentLogger() })).toThrow(
      InputValidationError
    );
  });

  it('owns a copy of the workflow', () => {
    const { session } = createSession();
    expect(session.workflow).toEqual(demo);
    expect(session.workflow).not.toBe(demo);
  });
});

describe('describeState', () => {
  it('renders each state', () => {
    expect(describeState({ kind: 'step_breakpoint' })).toBe('StepBreakpoint');
    expect(describeState({ kind: 'failed', reason: 'bad' })).toBe('Failed(bad)');
  });
});
