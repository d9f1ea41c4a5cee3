import { defineRecord, t } from '../descriptor.js';
import type { RecordOf } from '../descriptor.js';

/**
 * Permission map of an app installation or a repository collaborator.
 * App permissions are access levels (`read`, `write`); repository
 * permissions are booleans, so those three keys are typed separately.
 */
export const permissionsDescriptor = defineRecord('Permissions', {
  metadata: t.string().optional(),
  contents: t.string().optional(),
  issues: t.string().optional(),
  administration: t.string().optional(),
  statuses: t.string().optional(),
  repositoryProjects: t.string().from('repository_projects').optional(),
  members: t.string().optional(),
  repositoryHooks: t.string().from('repository_hooks').optional(),
  pullRequests: t.string().from('pull_requests').optional(),
  pages: t.string().optional(),
  deployments: t.string().optional(),
  checks: t.string().optional(),
  vulnerabilityAlerts: t.string().from('vulnerability_alerts').optional(),
  organizationAdministration: t.string().from('organization_administration').optional(),
  organizationHooks: t.string().from('organization_hooks').optional(),
  organizationPlan: t.string().from('organization_plan').optional(),
  organizationProjects: t.string().from('organization_projects').optional(),
  organizationUserBlocking: t.string().from('organization_user_blocking').optional(),
  teamDiscussions: t.string().from('team_discussions').optional(),
  admin: t.boolean().optional(),
  push: t.boolean().optional(),
  pull: t.boolean().optional(),
});

export type Permissions = RecordOf<typeof permissionsDescriptor>;
