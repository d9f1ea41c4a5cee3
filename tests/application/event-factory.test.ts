import { describe, it, expect, vi, beforeEach } from 'vitest';
import { FallbackValidationError, UnknownEventTypeError, userDescriptor } from '../../src/domain/index.js';
import {
  ModelOverrides,
  createEventParser,
  isEvent,
  isFallbackEvent,
  unrecognizedFields,
} from '../../src/application/index.js';
import {
  makeCheckRunPayload,
  makeDeploymentStatusPayload,
  makeLabelPayload,
  makePullRequestPayload,
  makePushPayload,
  makeSecurityAdvisoryPayload,
} from '../fixtures/payloads.js';

function fakeLogger() {
  return {
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  } as unknown as import('pino').Logger;
}

describe('EventParser', () => {
  let log: ReturnType<typeof fakeLogger>;

  beforeEach(() => {
    log = fakeLogger();
  });

  it('builds the event-specific envelope for a valid payload', () => {
    const parser = createEventParser({ logger: log });
    const event = parser.parse('pull_request', makePullRequestPayload());

    expect(isFallbackEvent(event)).toBe(false);
    expect(isEvent(event, 'pull_request')).toBe(true);
    if (!isEvent(event, 'pull_request')) return;

    expect(event.action).toBe('opened');
    expect(event.number).toBe(7);
    expect(event.pullRequest.title).toBe('Add widget polishing');
    expect(event.pullRequest.head.ref).toBe('polish');
    expect(event.pullRequest.labels.map((l) => l.name)).toEqual(['bug']);
    expect(event.repository?.fullName).toBe('acme/widgets');
    expect(event.pullRequest.reviewCommentUrl?.(3)).toBe(
      'https://api.github.com/repos/acme/widgets/pulls/comments/3',
    );
    expect(log.warn).not.toHaveBeenCalled();
  });

  it('parses a push with commits and no action', () => {
    const parser = createEventParser({ logger: log });
    const event = parser.parse('push', makePushPayload());

    expect(isEvent(event, 'push')).toBe(true);
    if (!isEvent(event, 'push')) return;

    expect(event.action).toBeNull();
    expect(event.ref).toBe('refs/heads/main');
    expect(event.commits).toHaveLength(1);
    expect(event.headCommit?.author.username).toBe('octo-tester');
    expect(event.pusher?.name).toBe('octo-tester');
  });

  it('keeps numeric repository timestamps of a push as unrecognized fields', () => {
    const parser = createEventParser({ logger: log });
    const event = parser.parse('push', makePushPayload());

    expect(isFallbackEvent(event)).toBe(false);
    expect(event.repository && unrecognizedFields(event.repository)).toEqual({
      created_at: 1772000000,
      pushed_at: 1772350000,
    });
    expect(log.warn).not.toHaveBeenCalled();
  });

  it('parses security_advisory without the common base fields', () => {
    const parser = createEventParser({ logger: log });
    const event = parser.parse('security_advisory', makeSecurityAdvisoryPayload());

    expect(isEvent(event, 'security_advisory')).toBe(true);
    if (!isEvent(event, 'security_advisory')) return;

    expect(event.action).toBe('published');
    expect(event.securityAdvisory.ghsaId).toBe('GHSA-test-0000-0000');
    expect(event.securityAdvisory.vulnerabilities[0]?.firstPatchedVersion?.identifier).toBe('1.2.0');
    expect('repository' in event).toBe(false);
  });

  it('parses check_run with its suite and pull request refs', () => {
    const parser = createEventParser({ logger: log });
    const event = parser.parse('check_run', makeCheckRunPayload());

    expect(isEvent(event, 'check_run')).toBe(true);
    if (!isEvent(event, 'check_run')) return;

    expect(event.checkRun.name).toBe('lint');
    expect(event.checkRun.output?.annotationsCount).toBe(0);
    expect(event.checkRun.checkSuite?.pullRequests[0]?.head.ref).toBe('polish');
    expect(event.checkRun.app?.slug).toBe('widget-ci');
  });

  it('parses deployment_status with the deployment payload as an open map', () => {
    const parser = createEventParser({ logger: log });
    const event = parser.parse('deployment_status', makeDeploymentStatusPayload());

    expect(isEvent(event, 'deployment_status')).toBe(true);
    if (!isEvent(event, 'deployment_status')) return;

    expect(event.deploymentStatus.state).toBe('success');
    expect(event.deploymentStatus.targetUrl).toBe('https://staging.example.test');
    expect(event.deployment.environment).toBe('staging');
    expect(event.deployment.data).toEqual({ migrate: true });
  });

  it('falls back for an unknown event name and logs it', () => {
    const parser = createEventParser({ logger: log });
    const event = parser.parse('widget_polished', makeLabelPayload());

    expect(isFallbackEvent(event)).toBe(true);
    expect(event.action).toBe('created');
    expect(event.repository?.fullName).toBe('acme/widgets');
    expect(event.sender?.login).toBe('octo-tester');
    expect(unrecognizedFields(event)).toHaveProperty('label');

    expect(log.warn).toHaveBeenCalledWith(
      expect.objectContaining({ event: 'widget_polished', err: expect.any(UnknownEventTypeError) }),
      'Unknown event type, using fallback',
    );
  });

  it('treats event names case-sensitively', () => {
    const parser = createEventParser({ logger: log });
    const event = parser.parse('LABEL', makeLabelPayload());
    expect(isFallbackEvent(event)).toBe(true);
  });

  it('falls back when the payload fails its descriptor and logs the issues', () => {
    const parser = createEventParser({ logger: log });
    const payload = makePullRequestPayload();
    delete payload['number'];

    const event = parser.parse('pull_request', payload);

    expect(isFallbackEvent(event)).toBe(true);
    expect(event.action).toBe('opened');
    expect(unrecognizedFields(event)['pull_request']).toEqual(payload['pull_request']);
    expect(log.warn).toHaveBeenCalledWith(
      {
        event: 'pull_request',
        descriptor: 'PullRequestEvent',
        issues: ['number: required field is missing'],
      },
      'Payload failed validation, using fallback',
    );
  });

  it('reads wrongly typed fallback fields as absent', () => {
    const parser = createEventParser({ logger: log });
    const event = parser.parse('totally_unknown_event', { action: 1 });

    expect(isFallbackEvent(event)).toBe(true);
    expect(event.action).toBeNull();
    expect(unrecognizedFields(event)).toEqual({ action: 1 });
  });

  it('keeps a drifted nested value out of the fallback reference', () => {
    const parser = createEventParser({ logger: log });
    const event = parser.parse('label', {
      action: 'created',
      sender: { id: 'abc', login: 'octo-tester' },
      repository: 'acme/widgets',
    });

    expect(isFallbackEvent(event)).toBe(true);
    expect(event.action).toBe('created');
    expect(event.sender?.id).toBeNull();
    expect(event.sender?.login).toBe('octo-tester');
    expect(event.sender && unrecognizedFields(event.sender)).toEqual({ id: 'abc' });
    expect(event.repository).toBeNull();
    expect(unrecognizedFields(event)).toEqual({ repository: 'acme/widgets' });
  });

  it('throws when the payload is not a JSON object', () => {
    const parser = createEventParser({ logger: log });

    expect(() => parser.parse('label', 'not an object')).toThrow(FallbackValidationError);
    expect(() => parser.parse('label', [])).toThrow(FallbackValidationError);
  });

  it('applies model overrides to every nested record of the descriptor', () => {
    const overrides = new ModelOverrides();
    overrides.set(userDescriptor, (user) => ({ mention: `@${user.login}` }));
    const parser = createEventParser({ logger: log, overrides });

    const event = parser.parse('pull_request', makePullRequestPayload());
    if (!isEvent(event, 'pull_request')) throw new Error('expected a pull_request envelope');

    const sender: object | null = event.sender;
    const author: object = event.pullRequest.user;
    expect(sender !== null && 'mention' in sender && sender.mention).toBe('@octo-tester');
    expect('mention' in author && author.mention).toBe('@octo-tester');
  });

  it('accepts bare field names when configured', () => {
    const parser = createEventParser({ logger: log, acceptFieldNames: true });
    const payload = makePullRequestPayload();
    const pullRequest = payload['pull_request'];
    delete payload['pull_request'];

    const event = parser.parse('pull_request', { ...payload, pullRequest });
    expect(isEvent(event, 'pull_request')).toBe(true);
  });
});
