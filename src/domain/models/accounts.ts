import { defineRecord, t } from '../descriptor.js';
import type { RecordOf } from '../descriptor.js';
import { permissionsDescriptor } from './permissions.js';

/**
 * Account-like records: users, organizations, enterprises, teams and
 * app installations.
 */

export const userDescriptor = defineRecord('User', {
  login: t.string(),
  id: t.integer(),
  nodeId: t.string().from('node_id').optional(),
  name: t.string().optional(),
  email: t.string().optional(),
  avatarUrl: t.string().from('avatar_url').optional(),
  gravatarId: t.string().from('gravatar_id').optional(),
  url: t.string().optional(),
  htmlUrl: t.string().from('html_url').optional(),
  followersUrl: t.string().from('followers_url').optional(),
  subscriptionsUrl: t.string().from('subscriptions_url').optional(),
  organizationsUrl: t.string().from('organizations_url').optional(),
  reposUrl: t.string().from('repos_url').optional(),
  receivedEventsUrl: t.string().from('received_events_url').optional(),
  type: t.string().optional(),
  siteAdmin: t.boolean().from('site_admin').optional(),
  followingUrl: t.template('other_user').from('following_url').optional(),
  gistsUrl: t.template('gist_id').from('gists_url').optional(),
  starredUrl: t.template('owner', 'repo').from('starred_url').optional(),
  eventsUrl: t.template('privacy').from('events_url').optional(),
});

export type User = RecordOf<typeof userDescriptor>;

export const enterpriseDescriptor = defineRecord('Enterprise', {
  id: t.integer(),
  slug: t.string(),
  name: t.string(),
  nodeId: t.string().from('node_id').optional(),
  avatarUrl: t.string().from('avatar_url').optional(),
  description: t.string().optional(),
  websiteUrl: t.string().from('website_url').optional(),
  htmlUrl: t.string().from('html_url').optional(),
  createdAt: t.string().from('created_at').optional(),
  updatedAt: t.string().from('updated_at').optional(),
});

export type Enterprise = RecordOf<typeof enterpriseDescriptor>;

export const organizationDescriptor = defineRecord('Organization', {
  login: t.string(),
  id: t.integer(),
  nodeId: t.string().from('node_id').optional(),
  url: t.string().optional(),
  reposUrl: t.string().from('repos_url').optional(),
  eventsUrl: t.string().from('events_url').optional(),
  hooksUrl: t.string().from('hooks_url').optional(),
  issuesUrl: t.string().from('issues_url').optional(),
  avatarUrl: t.string().from('avatar_url').optional(),
  description: t.string().optional(),
  membersUrl: t.template('member').from('members_url').optional(),
  publicMembersUrl: t.template('member').from('public_members_url').optional(),
});

export type Organization = RecordOf<typeof organizationDescriptor>;

export const teamDescriptor = defineRecord('Team', {
  id: t.integer(),
  name: t.string(),
  slug: t.string(),
  nodeId: t.string().from('node_id').optional(),
  description: t.string().optional(),
  privacy: t.string().optional(),
  url: t.string().optional(),
  htmlUrl: t.string().from('html_url').optional(),
  repositoriesUrl: t.string().from('repositories_url').optional(),
  permission: t.string().optional(),
  membersUrl: t.template('member').from('members_url').optional(),
});

export type Team = RecordOf<typeof teamDescriptor>;

export const membershipDescriptor = defineRecord('Membership', {
  url: t.string(),
  state: t.string(),
  role: t.string(),
  organizationUrl: t.string().from('organization_url'),
  user: t.record(() => userDescriptor),
});

export type Membership = RecordOf<typeof membershipDescriptor>;

export const installationDescriptor = defineRecord('Installation', {
  id: t.integer(),
  nodeId: t.string().from('node_id').optional(),
  account: t.record(() => userDescriptor).optional(),
  repositorySelection: t.string().from('repository_selection').optional(),
  accessTokensUrl: t.string().from('access_tokens_url').optional(),
  repositoriesUrl: t.string().from('repositories_url').optional(),
  htmlUrl: t.string().from('html_url').optional(),
  appId: t.integer().from('app_id').optional(),
  targetId: t.integer().from('target_id').optional(),
  targetType: t.string().from('target_type').optional(),
  permissions: t.record(() => permissionsDescriptor).optional(),
  events: t.strings().optional(),
  singleFileName: t.string().from('single_file_name').optional(),
});

export type Installation = RecordOf<typeof installationDescriptor>;
