import { defineRecord, t } from '../descriptor.js';
import type { RecordOf } from '../descriptor.js';
import { userDescriptor } from './accounts.js';
import { permissionsDescriptor } from './permissions.js';

/** `{+path}` is a reserved-expansion placeholder; the interpolator only knows `{path}`. */
const stripReservedExpansion = (template: string): string => template.replaceAll('+', '');

export const shortRepositoryDescriptor = defineRecord('ShortRepository', {
  id: t.integer(),
  name: t.string(),
  fullName: t.string().from('full_name'),
  nodeId: t.string().from('node_id').optional(),
  private: t.boolean().optional(),
});

export type ShortRepository = RecordOf<typeof shortRepositoryDescriptor>;

export const licenseDescriptor = defineRecord('License', {
  key: t.string(),
  name: t.string(),
  spdxId: t.string().from('spdx_id').optional(),
  url: t.string().optional(),
  nodeId: t.string().from('node_id').optional(),
});

export type License = RecordOf<typeof licenseDescriptor>;

export const repositoryDescriptor = defineRecord('Repository', {
  id: t.integer(),
  nodeId: t.string().from('node_id').optional(),
  name: t.string(),
  fullName: t.string().from('full_name'),
  private: t.boolean(),
  owner: t.record(() => userDescriptor),
  htmlUrl: t.string().from('html_url').optional(),
  description: t.string().optional(),
  fork: t.boolean().optional(),
  url: t.string().optional(),
  homepage: t.string().optional(),
  language: t.string().optional(),
  license: t.record(() => licenseDescriptor).optional(),
  defaultBranch: t.string().from('default_branch').optional(),
  masterBranch: t.string().from('master_branch').optional(),
  visibility: t.string().optional(),
  topics: t.strings().optional(),
  permissions: t.record(() => permissionsDescriptor).optional(),

  // created_at and pushed_at are ISO strings in most events but Unix
  // seconds in push, so they stay with the unrecognized fields.
  updatedAt: t.string().from('updated_at').optional(),

  size: t.integer().optional(),
  stargazersCount: t.integer().from('stargazers_count').optional(),
  watchersCount: t.integer().from('watchers_count').optional(),
  forksCount: t.integer().from('forks_count').optional(),
  openIssuesCount: t.integer().from('open_issues_count').optional(),
  forks: t.integer().optional(),
  openIssues: t.integer().from('open_issues').optional(),
  watchers: t.integer().optional(),
  stargazers: t.integer().optional(),

  hasIssues: t.boolean().from('has_issues').optional(),
  hasProjects: t.boolean().from('has_projects').optional(),
  hasDownloads: t.boolean().from('has_downloads').optional(),
  hasWiki: t.boolean().from('has_wiki').optional(),
  hasPages: t.boolean().from('has_pages').optional(),
  archived: t.boolean().optional(),
  disabled: t.boolean().optional(),
  isTemplate: t.boolean().from('is_template').optional(),
  public: t.boolean().optional(),
  allowForking: t.boolean().from('allow_forking').optional(),
  allowSquashMerge: t.boolean().from('allow_squash_merge').optional(),
  allowMergeCommit: t.boolean().from('allow_merge_commit').optional(),
  allowRebaseMerge: t.boolean().from('allow_rebase_merge').optional(),
  allowAutoMerge: t.boolean().from('allow_auto_merge').optional(),
  allowUpdateBranch: t.boolean().from('allow_update_branch').optional(),
  deleteBranchOnMerge: t.boolean().from('delete_branch_on_merge').optional(),
  webCommitSignoffRequired: t.boolean().from('web_commit_signoff_required').optional(),

  gitUrl: t.string().from('git_url').optional(),
  sshUrl: t.string().from('ssh_url').optional(),
  cloneUrl: t.string().from('clone_url').optional(),
  svnUrl: t.string().from('svn_url').optional(),
  mirrorUrl: t.string().from('mirror_url').optional(),
  forksUrl: t.string().from('forks_url').optional(),
  teamsUrl: t.string().from('teams_url').optional(),
  hooksUrl: t.string().from('hooks_url').optional(),
  eventsUrl: t.string().from('events_url').optional(),
  tagsUrl: t.string().from('tags_url').optional(),
  languagesUrl: t.string().from('languages_url').optional(),
  stargazersUrl: t.string().from('stargazers_url').optional(),
  contributorsUrl: t.string().from('contributors_url').optional(),
  subscribersUrl: t.string().from('subscribers_url').optional(),
  subscriptionUrl: t.string().from('subscription_url').optional(),
  mergesUrl: t.string().from('merges_url').optional(),
  downloadsUrl: t.string().from('downloads_url').optional(),
  deploymentsUrl: t.string().from('deployments_url').optional(),

  keysUrl: t.template('key_id').from('keys_url').optional(),
  collaboratorsUrl: t.template('collaborator').from('collaborators_url').optional(),
  issueEventsUrl: t.template('number').from('issue_events_url').optional(),
  assigneesUrl: t.template('user').from('assignees_url').optional(),
  branchesUrl: t.template('branch').from('branches_url').optional(),
  blobsUrl: t.template('sha').from('blobs_url').optional(),
  gitTagsUrl: t.template('sha').from('git_tags_url').optional(),
  gitRefsUrl: t.template('sha').from('git_refs_url').optional(),
  treesUrl: t.template('sha').from('trees_url').optional(),
  statusesUrl: t.template('sha').from('statuses_url').optional(),
  commitsUrl: t.template('sha').from('commits_url').optional(),
  gitCommitsUrl: t.template('sha').from('git_commits_url').optional(),
  commentsUrl: t.template('number').from('comments_url').optional(),
  issueCommentUrl: t.template('number').from('issue_comment_url').optional(),
  contentsUrl: t.preparedTemplate(stripReservedExpansion, 'path').from('contents_url').optional(),
  compareUrl: t.template('base', 'head').from('compare_url').optional(),
  archiveUrl: t.template('archive_format', 'ref').from('archive_url').optional(),
  issuesUrl: t.template('number').from('issues_url').optional(),
  pullsUrl: t.template('number').from('pulls_url').optional(),
  milestonesUrl: t.template('number').from('milestones_url').optional(),
  labelsUrl: t.template('name').from('labels_url').optional(),
  releasesUrl: t.template('id').from('releases_url').optional(),
  notificationsUrl: t.string().from('notifications_url').optional(),
});

export type Repository = RecordOf<typeof repositoryDescriptor>;

/**
 * Builds the notifications URL. The raw template ends in the query
 * expansion `{?since,all,participating}`; `query` (which must start with
 * `?`) replaces it, or it is dropped when no query is given.
 */
export function notificationsUrl(repository: Repository, query?: string): string | null {
  if (query !== undefined && !query.startsWith('?')) {
    throw new TypeError('Notifications query must start with "?"');
  }
  if (repository.notificationsUrl === null) {
    return null;
  }
  return repository.notificationsUrl.replace('{?since,all,participating}', query ?? '');
}
