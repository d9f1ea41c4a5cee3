import { defineRecord, t } from '../descriptor.js';
import type { RecordOf } from '../descriptor.js';
import { userDescriptor } from './accounts.js';

export const deploymentDescriptor = defineRecord('Deployment', {
  id: t.integer(),
  sha: t.string(),
  ref: t.string(),
  environment: t.string(),
  url: t.string().optional(),
  nodeId: t.string().from('node_id').optional(),
  task: t.string().optional(),
  // The deployment's own free-form `payload` object.
  data: t.openMap().from('payload').optional(),
  originalEnvironment: t.string().from('original_environment').optional(),
  description: t.string().optional(),
  creator: t.record(() => userDescriptor).optional(),
  createdAt: t.string().from('created_at').optional(),
  updatedAt: t.string().from('updated_at').optional(),
  statusesUrl: t.string().from('statuses_url').optional(),
  repositoryUrl: t.string().from('repository_url').optional(),
});

export type Deployment = RecordOf<typeof deploymentDescriptor>;

export const deploymentStatusDescriptor = defineRecord('DeploymentStatus', {
  id: t.integer(),
  state: t.string(),
  url: t.string().optional(),
  nodeId: t.string().from('node_id').optional(),
  creator: t.record(() => userDescriptor).optional(),
  description: t.string().optional(),
  environment: t.string().optional(),
  targetUrl: t.string().from('target_url').optional(),
  logUrl: t.string().from('log_url').optional(),
  createdAt: t.string().from('created_at').optional(),
  updatedAt: t.string().from('updated_at').optional(),
  deploymentUrl: t.string().from('deployment_url').optional(),
  repositoryUrl: t.string().from('repository_url').optional(),
});

export type DeploymentStatus = RecordOf<typeof deploymentStatusDescriptor>;

/** Branch containing the commit of a `status` event. */
export const statusBranchDescriptor = defineRecord('StatusBranch', {
  name: t.string(),
  commit: t.openMap().optional(),
  protected: t.boolean().optional(),
});
