import { describe, it, expect, vi } from 'vitest';
import { join } from 'node:path';
import {
  createConfiguredRuntime,
  createRuntime,
  defaultRuntime,
  handleWebhook,
  hook,
  isEvent,
  parse,
  register,
  reset,
} from '../src/index.js';
import { makeIssuesPayload, makeLabelPayload } from './fixtures/payloads.js';

describe('top-level API', () => {
  afterEach(() => {
    reset();
  });

  it('registers on and dispatches through the default runtime', () => {
    const onIssue = vi.fn();
    const decorated = hook('issues', { actions: ['opened'] })(onIssue);
    register('label', vi.fn());

    const summary = handleWebhook('issues', makeIssuesPayload());

    expect(decorated).toBe(onIssue);
    expect(onIssue).toHaveBeenCalledTimes(1);
    expect(summary).toMatchObject({ event: 'issues', matched: 1, succeeded: 1 });
    expect(defaultRuntime.registry.size).toBe(2);
  });

  it('clears registrations on reset', () => {
    register('label', vi.fn());
    reset();
    expect(defaultRuntime.registry.size).toBe(0);
  });

  it('parses without dispatching', () => {
    const event = parse('issues', makeIssuesPayload());
    expect(isEvent(event, 'issues') && event.issue.number).toBe(12);
  });
});

describe('createRuntime', () => {
  it('keeps runtimes independent', () => {
    const a = createRuntime();
    const b = createRuntime();
    a.registry.register('label', vi.fn());

    expect(b.handleWebhook('label', makeLabelPayload()).matched).toBe(0);
  });
});

describe('createConfiguredRuntime', () => {
  it('falls back to defaults without a config file', async () => {
    const runtime = await createConfiguredRuntime(join(process.cwd(), 'no-such-config.yaml'));
    expect(runtime.isConfigured).toBe(true);
    expect(runtime.registry.size).toBe(0);
  });
});
