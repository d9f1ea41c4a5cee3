import { defineRecord, t } from '../descriptor.js';
import type { RecordOf } from '../descriptor.js';
import {
  checkRunDescriptor,
  checkSuiteDescriptor,
  commentDescriptor,
  commitDescriptor,
  commitUserDescriptor,
  deploymentDescriptor,
  deploymentStatusDescriptor,
  hookDescriptor,
  installationDescriptor,
  issueDescriptor,
  labelDescriptor,
  membershipDescriptor,
  milestoneDescriptor,
  pageDescriptor,
  pullRequestDescriptor,
  releaseDescriptor,
  repositoryDescriptor,
  reviewDescriptor,
  securityAdvisoryDescriptor,
  shortRepositoryDescriptor,
  statusBranchDescriptor,
  teamDescriptor,
  userDescriptor,
} from '../models/index.js';
import { baseEventShape } from './base.js';

export const checkRunEventDescriptor = defineRecord('CheckRunEvent', {
  ...baseEventShape,
  checkRun: t.record(() => checkRunDescriptor).from('check_run'),
  requestedAction: t.openMap().from('requested_action').optional(),
});

export const checkSuiteEventDescriptor = defineRecord('CheckSuiteEvent', {
  ...baseEventShape,
  checkSuite: t.record(() => checkSuiteDescriptor).from('check_suite'),
});

export const commitCommentEventDescriptor = defineRecord('CommitCommentEvent', {
  ...baseEventShape,
  comment: t.record(() => commentDescriptor),
});

export const createEventDescriptor = defineRecord('CreateEvent', {
  ...baseEventShape,
  ref: t.string(),
  refType: t.string().from('ref_type'),
  masterBranch: t.string().from('master_branch').optional(),
  description: t.string().optional(),
  pusherType: t.string().from('pusher_type').optional(),
});

export const deleteEventDescriptor = defineRecord('DeleteEvent', {
  ...baseEventShape,
  ref: t.string(),
  refType: t.string().from('ref_type'),
  pusherType: t.string().from('pusher_type').optional(),
});

export const deploymentEventDescriptor = defineRecord('DeploymentEvent', {
  ...baseEventShape,
  deployment: t.record(() => deploymentDescriptor),
});

export const deploymentStatusEventDescriptor = defineRecord('DeploymentStatusEvent', {
  ...baseEventShape,
  deploymentStatus: t.record(() => deploymentStatusDescriptor).from('deployment_status'),
  deployment: t.record(() => deploymentDescriptor),
});

export const forkEventDescriptor = defineRecord('ForkEvent', {
  ...baseEventShape,
  forkee: t.record(() => repositoryDescriptor),
});

export const gollumEventDescriptor = defineRecord('GollumEvent', {
  ...baseEventShape,
  pages: t.list(() => pageDescriptor),
});

export const installationEventDescriptor = defineRecord('InstallationEvent', {
  ...baseEventShape,
  installation: t.record(() => installationDescriptor),
  repositories: t.list(() => shortRepositoryDescriptor).optional(),
  requester: t.record(() => userDescriptor).optional(),
});

export const installationRepositoriesEventDescriptor = defineRecord('InstallationRepositoriesEvent', {
  ...baseEventShape,
  installation: t.record(() => installationDescriptor),
  repositorySelection: t.string().from('repository_selection'),
  repositoriesAdded: t.list(() => shortRepositoryDescriptor).from('repositories_added').optional(),
  repositoriesRemoved: t.list(() => shortRepositoryDescriptor).from('repositories_removed').optional(),
});

export const issueCommentEventDescriptor = defineRecord('IssueCommentEvent', {
  ...baseEventShape,
  issue: t.record(() => issueDescriptor),
  comment: t.record(() => commentDescriptor),
  changes: t.openMap().optional(),
});

export const issuesEventDescriptor = defineRecord('IssuesEvent', {
  ...baseEventShape,
  issue: t.record(() => issueDescriptor),
  changes: t.openMap().optional(),
  label: t.record(() => labelDescriptor).optional(),
  assignee: t.record(() => userDescriptor).optional(),
  milestone: t.record(() => milestoneDescriptor).optional(),
});

export const labelEventDescriptor = defineRecord('LabelEvent', {
  ...baseEventShape,
  label: t.record(() => labelDescriptor),
  changes: t.openMap().optional(),
});

export const memberEventDescriptor = defineRecord('MemberEvent', {
  ...baseEventShape,
  member: t.record(() => userDescriptor),
  changes: t.openMap().optional(),
});

export const membershipEventDescriptor = defineRecord('MembershipEvent', {
  ...baseEventShape,
  scope: t.string(),
  member: t.record(() => userDescriptor),
  team: t.record(() => teamDescriptor),
});

export const metaEventDescriptor = defineRecord('MetaEvent', {
  ...baseEventShape,
  hookId: t.integer().from('hook_id'),
  hook: t.record(() => hookDescriptor),
});

export const milestoneEventDescriptor = defineRecord('MilestoneEvent', {
  ...baseEventShape,
  milestone: t.record(() => milestoneDescriptor),
  changes: t.openMap().optional(),
});

export const orgBlockEventDescriptor = defineRecord('OrgBlockEvent', {
  ...baseEventShape,
  blockedUser: t.record(() => userDescriptor).from('blocked_user'),
});

export const organizationEventDescriptor = defineRecord('OrganizationEvent', {
  ...baseEventShape,
  membership: t.record(() => membershipDescriptor).optional(),
  invitation: t.openMap().optional(),
});

export const pingEventDescriptor = defineRecord('PingEvent', {
  ...baseEventShape,
  zen: t.string(),
  hookId: t.integer().from('hook_id'),
  hook: t.record(() => hookDescriptor),
});

export const publicEventDescriptor = defineRecord('PublicEvent', {
  ...baseEventShape,
});

export const pullRequestEventDescriptor = defineRecord('PullRequestEvent', {
  ...baseEventShape,
  number: t.integer(),
  pullRequest: t.record(() => pullRequestDescriptor).from('pull_request'),
  assignee: t.record(() => userDescriptor).optional(),
  label: t.record(() => labelDescriptor).optional(),
  changes: t.openMap().optional(),
  before: t.string().optional(),
  after: t.string().optional(),
  requestedReviewer: t.record(() => userDescriptor).from('requested_reviewer').optional(),
  requestedTeam: t.record(() => teamDescriptor).from('requested_team').optional(),
});

export const pullRequestReviewEventDescriptor = defineRecord('PullRequestReviewEvent', {
  ...baseEventShape,
  review: t.record(() => reviewDescriptor),
  pullRequest: t.record(() => pullRequestDescriptor).from('pull_request'),
  changes: t.openMap().optional(),
});

export const pullRequestReviewCommentEventDescriptor = defineRecord('PullRequestReviewCommentEvent', {
  ...baseEventShape,
  comment: t.record(() => commentDescriptor),
  pullRequest: t.record(() => pullRequestDescriptor).from('pull_request'),
  changes: t.openMap().optional(),
});

export const pushEventDescriptor = defineRecord('PushEvent', {
  ...baseEventShape,
  ref: t.string(),
  before: t.string(),
  after: t.string(),
  created: t.boolean().optional(),
  deleted: t.boolean().optional(),
  forced: t.boolean().optional(),
  baseRef: t.string().from('base_ref').optional(),
  compare: t.string().optional(),
  commits: t.list(() => commitDescriptor).optional(),
  headCommit: t.record(() => commitDescriptor).from('head_commit').optional(),
  pusher: t.record(() => commitUserDescriptor).optional(),
});

export const releaseEventDescriptor = defineRecord('ReleaseEvent', {
  ...baseEventShape,
  release: t.record(() => releaseDescriptor),
  changes: t.openMap().optional(),
});

export const repositoryEventDescriptor = defineRecord('RepositoryEvent', {
  ...baseEventShape,
  changes: t.openMap().optional(),
});

export const repositoryDispatchEventDescriptor = defineRecord('RepositoryDispatchEvent', {
  ...baseEventShape,
  branch: t.string().optional(),
  clientPayload: t.openMap().from('client_payload').optional(),
});

/** The one event without the common fields: only `action` and the advisory. */
export const securityAdvisoryEventDescriptor = defineRecord('SecurityAdvisoryEvent', {
  action: t.string().optional(),
  securityAdvisory: t.record(() => securityAdvisoryDescriptor).from('security_advisory'),
});

export const starEventDescriptor = defineRecord('StarEvent', {
  ...baseEventShape,
  starredAt: t.string().from('starred_at').optional(),
});

export const statusEventDescriptor = defineRecord('StatusEvent', {
  ...baseEventShape,
  id: t.integer(),
  sha: t.string(),
  state: t.string(),
  name: t.string().optional(),
  targetUrl: t.string().from('target_url').optional(),
  context: t.string().optional(),
  description: t.string().optional(),
  commit: t.openMap().optional(),
  branches: t.list(() => statusBranchDescriptor).optional(),
  createdAt: t.string().from('created_at').optional(),
  updatedAt: t.string().from('updated_at').optional(),
});

export const teamEventDescriptor = defineRecord('TeamEvent', {
  ...baseEventShape,
  team: t.record(() => teamDescriptor),
  changes: t.openMap().optional(),
});

export const teamAddEventDescriptor = defineRecord('TeamAddEvent', {
  ...baseEventShape,
  team: t.record(() => teamDescriptor),
});

export const watchEventDescriptor = defineRecord('WatchEvent', {
  ...baseEventShape,
});

/** Event name (the `X-GitHub-Event` header value) to descriptor. Case-sensitive. */
export const EVENT_DESCRIPTORS = {
  check_run: checkRunEventDescriptor,
  check_suite: checkSuiteEventDescriptor,
  commit_comment: commitCommentEventDescriptor,
  create: createEventDescriptor,
  delete: deleteEventDescriptor,
  deployment: deploymentEventDescriptor,
  deployment_status: deploymentStatusEventDescriptor,
  fork: forkEventDescriptor,
  gollum: gollumEventDescriptor,
  installation: installationEventDescriptor,
  installation_repositories: installationRepositoriesEventDescriptor,
  issue_comment: issueCommentEventDescriptor,
  issues: issuesEventDescriptor,
  label: labelEventDescriptor,
  member: memberEventDescriptor,
  membership: membershipEventDescriptor,
  meta: metaEventDescriptor,
  milestone: milestoneEventDescriptor,
  org_block: orgBlockEventDescriptor,
  organization: organizationEventDescriptor,
  ping: pingEventDescriptor,
  public: publicEventDescriptor,
  pull_request: pullRequestEventDescriptor,
  pull_request_review: pullRequestReviewEventDescriptor,
  pull_request_review_comment: pullRequestReviewCommentEventDescriptor,
  push: pushEventDescriptor,
  release: releaseEventDescriptor,
  repository: repositoryEventDescriptor,
  repository_dispatch: repositoryDispatchEventDescriptor,
  security_advisory: securityAdvisoryEventDescriptor,
  star: starEventDescriptor,
  status: statusEventDescriptor,
  team: teamEventDescriptor,
  team_add: teamAddEventDescriptor,
  watch: watchEventDescriptor,
} as const;

export type EventName = keyof typeof EVENT_DESCRIPTORS;

/** Envelope type per event name. */
export type EventEnvelopes = { readonly [K in EventName]: RecordOf<(typeof EVENT_DESCRIPTORS)[K]> };

export type CheckRunEvent = EventEnvelopes['check_run'];
export type CheckSuiteEvent = EventEnvelopes['check_suite'];
export type CommitCommentEvent = EventEnvelopes['commit_comment'];
export type CreateEvent = EventEnvelopes['create'];
export type DeleteEvent = EventEnvelopes['delete'];
export type DeploymentEvent = EventEnvelopes['deployment'];
export type DeploymentStatusEvent = EventEnvelopes['deployment_status'];
export type ForkEvent = EventEnvelopes['fork'];
export type GollumEvent = EventEnvelopes['gollum'];
export type InstallationEvent = EventEnvelopes['installation'];
export type InstallationRepositoriesEvent = EventEnvelopes['installation_repositories'];
export type IssueCommentEvent = EventEnvelopes['issue_comment'];
export type IssuesEvent = EventEnvelopes['issues'];
export type LabelEvent = EventEnvelopes['label'];
export type MemberEvent = EventEnvelopes['member'];
export type MembershipEvent = EventEnvelopes['membership'];
export type MetaEvent = EventEnvelopes['meta'];
export type MilestoneEvent = EventEnvelopes['milestone'];
export type OrgBlockEvent = EventEnvelopes['org_block'];
export type OrganizationEvent = EventEnvelopes['organization'];
export type PingEvent = EventEnvelopes['ping'];
export type PublicEvent = EventEnvelopes['public'];
export type PullRequestEvent = EventEnvelopes['pull_request'];
export type PullRequestReviewEvent = EventEnvelopes['pull_request_review'];
export type PullRequestReviewCommentEvent = EventEnvelopes['pull_request_review_comment'];
export type PushEvent = EventEnvelopes['push'];
export type ReleaseEvent = EventEnvelopes['release'];
export type RepositoryEvent = EventEnvelopes['repository'];
export type RepositoryDispatchEvent = EventEnvelopes['repository_dispatch'];
export type SecurityAdvisoryEvent = EventEnvelopes['security_advisory'];
export type StarEvent = EventEnvelopes['star'];
export type StatusEvent = EventEnvelopes['status'];
export type TeamEvent = EventEnvelopes['team'];
export type TeamAddEvent = EventEnvelopes['team_add'];
export type WatchEvent = EventEnvelopes['watch'];

export function isEventName(name: string): name is EventName {
  return Object.hasOwn(EVENT_DESCRIPTORS, name);
}
