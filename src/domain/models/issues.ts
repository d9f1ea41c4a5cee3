import { defineRecord, t } from '../descriptor.js';
import type { RecordOf } from '../descriptor.js';
import { userDescriptor } from './accounts.js';

export const labelDescriptor = defineRecord('Label', {
  id: t.integer(),
  name: t.string(),
  color: t.string(),
  nodeId: t.string().from('node_id').optional(),
  url: t.string().optional(),
  description: t.string().optional(),
  default: t.boolean().optional(),
});

export type Label = RecordOf<typeof labelDescriptor>;

export const milestoneDescriptor = defineRecord('Milestone', {
  id: t.integer(),
  number: t.integer(),
  title: t.string(),
  state: t.string(),
  nodeId: t.string().from('node_id').optional(),
  url: t.string().optional(),
  htmlUrl: t.string().from('html_url').optional(),
  labelsUrl: t.string().from('labels_url').optional(),
  description: t.string().optional(),
  creator: t.record(() => userDescriptor).optional(),
  openIssues: t.integer().from('open_issues').optional(),
  closedIssues: t.integer().from('closed_issues').optional(),
  createdAt: t.string().from('created_at').optional(),
  updatedAt: t.string().from('updated_at').optional(),
  dueOn: t.string().from('due_on').optional(),
  closedAt: t.string().from('closed_at').optional(),
});

export type Milestone = RecordOf<typeof milestoneDescriptor>;

export const issueDescriptor = defineRecord('Issue', {
  id: t.integer(),
  number: t.integer(),
  title: t.string(),
  user: t.record(() => userDescriptor),
  state: t.string(),
  nodeId: t.string().from('node_id').optional(),
  url: t.string().optional(),
  repositoryUrl: t.string().from('repository_url').optional(),
  commentsUrl: t.string().from('comments_url').optional(),
  eventsUrl: t.string().from('events_url').optional(),
  htmlUrl: t.string().from('html_url').optional(),
  labelsUrl: t.template('name').from('labels_url').optional(),
  labels: t.list(() => labelDescriptor).optional(),
  locked: t.boolean().optional(),
  assignee: t.record(() => userDescriptor).optional(),
  assignees: t.list(() => userDescriptor).optional(),
  milestone: t.record(() => milestoneDescriptor).optional(),
  comments: t.integer().optional(),
  createdAt: t.string().from('created_at').optional(),
  updatedAt: t.string().from('updated_at').optional(),
  closedAt: t.string().from('closed_at').optional(),
  authorAssociation: t.string().from('author_association').optional(),
  activeLockReason: t.string().from('active_lock_reason').optional(),
  body: t.string().optional(),
  reactions: t.openMap().optional(),
});

export type Issue = RecordOf<typeof issueDescriptor>;

/** Issue, commit and pull request review comments share one shape. */
export const commentDescriptor = defineRecord('Comment', {
  id: t.integer(),
  user: t.record(() => userDescriptor),
  body: t.string(),
  nodeId: t.string().from('node_id').optional(),
  url: t.string().optional(),
  htmlUrl: t.string().from('html_url').optional(),
  issueUrl: t.string().from('issue_url').optional(),
  pullRequestUrl: t.string().from('pull_request_url').optional(),
  pullRequestReviewId: t.integer().from('pull_request_review_id').optional(),
  diffHunk: t.string().from('diff_hunk').optional(),
  path: t.string().optional(),
  position: t.integer().optional(),
  originalPosition: t.integer().from('original_position').optional(),
  line: t.integer().optional(),
  originalLine: t.integer().from('original_line').optional(),
  startLine: t.integer().from('start_line').optional(),
  originalStartLine: t.integer().from('original_start_line').optional(),
  side: t.string().optional(),
  startSide: t.string().from('start_side').optional(),
  commitId: t.string().from('commit_id').optional(),
  originalCommitId: t.string().from('original_commit_id').optional(),
  createdAt: t.string().from('created_at').optional(),
  updatedAt: t.string().from('updated_at').optional(),
  authorAssociation: t.string().from('author_association').optional(),
  links: t.openMap().from('_links').optional(),
  reactions: t.openMap().optional(),
});

export type Comment = RecordOf<typeof commentDescriptor>;
