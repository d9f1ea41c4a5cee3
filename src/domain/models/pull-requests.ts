import { defineRecord, t } from '../descriptor.js';
import type { RecordOf } from '../descriptor.js';
import { teamDescriptor, userDescriptor } from './accounts.js';
import { labelDescriptor, milestoneDescriptor } from './issues.js';
import { repositoryDescriptor } from './repository.js';

/** One side (`head` or `base`) of a pull request. */
export const refDescriptor = defineRecord('Ref', {
  label: t.string(),
  ref: t.string(),
  sha: t.string(),
  user: t.record(() => userDescriptor).optional(),
  repo: t.record(() => repositoryDescriptor).optional(),
});

export type Ref = RecordOf<typeof refDescriptor>;

export const pullRequestDescriptor = defineRecord('PullRequest', {
  id: t.integer(),
  number: t.integer(),
  state: t.string(),
  title: t.string(),
  user: t.record(() => userDescriptor),
  head: t.record(() => refDescriptor),
  base: t.record(() => refDescriptor),
  nodeId: t.string().from('node_id').optional(),
  url: t.string().optional(),
  htmlUrl: t.string().from('html_url').optional(),
  diffUrl: t.string().from('diff_url').optional(),
  patchUrl: t.string().from('patch_url').optional(),
  issueUrl: t.string().from('issue_url').optional(),
  commitsUrl: t.string().from('commits_url').optional(),
  reviewCommentsUrl: t.string().from('review_comments_url').optional(),
  commentsUrl: t.string().from('comments_url').optional(),
  statusesUrl: t.string().from('statuses_url').optional(),
  reviewCommentUrl: t.template('number').from('review_comment_url').optional(),
  body: t.string().optional(),
  locked: t.boolean().optional(),
  draft: t.boolean().optional(),
  merged: t.boolean().optional(),
  mergeable: t.boolean().optional(),
  rebaseable: t.boolean().optional(),
  mergeableState: t.string().from('mergeable_state').optional(),
  mergedBy: t.record(() => userDescriptor).from('merged_by').optional(),
  mergeCommitSha: t.string().from('merge_commit_sha').optional(),
  assignee: t.record(() => userDescriptor).optional(),
  assignees: t.list(() => userDescriptor).optional(),
  requestedReviewers: t.list(() => userDescriptor).from('requested_reviewers').optional(),
  requestedTeams: t.list(() => teamDescriptor).from('requested_teams').optional(),
  labels: t.list(() => labelDescriptor).optional(),
  milestone: t.record(() => milestoneDescriptor).optional(),
  createdAt: t.string().from('created_at').optional(),
  updatedAt: t.string().from('updated_at').optional(),
  closedAt: t.string().from('closed_at').optional(),
  mergedAt: t.string().from('merged_at').optional(),
  authorAssociation: t.string().from('author_association').optional(),
  activeLockReason: t.string().from('active_lock_reason').optional(),
  autoMerge: t.openMap().from('auto_merge').optional(),
  links: t.openMap().from('_links').optional(),
  comments: t.integer().optional(),
  reviewComments: t.integer().from('review_comments').optional(),
  maintainerCanModify: t.boolean().from('maintainer_can_modify').optional(),
  commits: t.integer().optional(),
  additions: t.integer().optional(),
  deletions: t.integer().optional(),
  changedFiles: t.integer().from('changed_files').optional(),
});

export type PullRequest = RecordOf<typeof pullRequestDescriptor>;

export const reviewDescriptor = defineRecord('Review', {
  id: t.integer(),
  user: t.record(() => userDescriptor),
  state: t.string(),
  nodeId: t.string().from('node_id').optional(),
  body: t.string().optional(),
  commitId: t.string().from('commit_id').optional(),
  submittedAt: t.string().from('submitted_at').optional(),
  htmlUrl: t.string().from('html_url').optional(),
  pullRequestUrl: t.string().from('pull_request_url').optional(),
  authorAssociation: t.string().from('author_association').optional(),
  links: t.openMap().from('_links').optional(),
});

export type Review = RecordOf<typeof reviewDescriptor>;
