import { defineRecord, t } from '../descriptor.js';
import type { RecordOf } from '../descriptor.js';
import { userDescriptor } from './accounts.js';
import { commitDescriptor } from './commits.js';

/** GitHub App that owns a check suite or run. */
export const checksAppDescriptor = defineRecord('ChecksApp', {
  id: t.integer(),
  slug: t.string().optional(),
  nodeId: t.string().from('node_id').optional(),
  owner: t.record(() => userDescriptor).optional(),
  name: t.string().optional(),
  description: t.string().optional(),
  externalUrl: t.string().from('external_url').optional(),
  htmlUrl: t.string().from('html_url').optional(),
  createdAt: t.string().from('created_at').optional(),
  updatedAt: t.string().from('updated_at').optional(),
});

/** Side of a pull request as embedded in check payloads. */
export const checksRefDescriptor = defineRecord('ChecksRef', {
  ref: t.string(),
  sha: t.string(),
  repo: t.openMap().optional(),
});

export const checksPullRequestDescriptor = defineRecord('ChecksPullRequest', {
  id: t.integer(),
  number: t.integer(),
  url: t.string().optional(),
  head: t.record(() => checksRefDescriptor),
  base: t.record(() => checksRefDescriptor),
});

export const checkSuiteDescriptor = defineRecord('CheckSuite', {
  id: t.integer(),
  headSha: t.string().from('head_sha'),
  nodeId: t.string().from('node_id').optional(),
  headBranch: t.string().from('head_branch').optional(),
  status: t.string().optional(),
  conclusion: t.string().optional(),
  url: t.string().optional(),
  before: t.string().optional(),
  after: t.string().optional(),
  pullRequests: t.list(() => checksPullRequestDescriptor).from('pull_requests').optional(),
  app: t.record(() => checksAppDescriptor).optional(),
  createdAt: t.string().from('created_at').optional(),
  updatedAt: t.string().from('updated_at').optional(),
  latestCheckRunsCount: t.integer().from('latest_check_runs_count').optional(),
  checkRunsUrl: t.string().from('check_runs_url').optional(),
  headCommit: t.record(() => commitDescriptor).from('head_commit').optional(),
});

export type CheckSuite = RecordOf<typeof checkSuiteDescriptor>;

export const checkRunOutputDescriptor = defineRecord('CheckRunOutput', {
  title: t.string().optional(),
  summary: t.string().optional(),
  text: t.string().optional(),
  annotationsCount: t.integer().from('annotations_count').optional(),
  annotationsUrl: t.string().from('annotations_url').optional(),
});

export const checkRunDescriptor = defineRecord('CheckRun', {
  id: t.integer(),
  name: t.string(),
  headSha: t.string().from('head_sha'),
  status: t.string(),
  nodeId: t.string().from('node_id').optional(),
  externalId: t.string().from('external_id').optional(),
  url: t.string().optional(),
  htmlUrl: t.string().from('html_url').optional(),
  detailsUrl: t.string().from('details_url').optional(),
  conclusion: t.string().optional(),
  startedAt: t.string().from('started_at').optional(),
  completedAt: t.string().from('completed_at').optional(),
  output: t.record(() => checkRunOutputDescriptor).optional(),
  checkSuite: t.record(() => checkSuiteDescriptor).from('check_suite').optional(),
  app: t.record(() => checksAppDescriptor).optional(),
  pullRequests: t.list(() => checksPullRequestDescriptor).from('pull_requests').optional(),
});

export type CheckRun = RecordOf<typeof checkRunDescriptor>;
