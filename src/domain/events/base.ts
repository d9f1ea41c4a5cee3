import { defineRecord, t } from '../descriptor.js';
import type { RecordOf } from '../descriptor.js';
import {
  enterpriseDescriptor,
  installationDescriptor,
  organizationDescriptor,
  repositoryDescriptor,
  userDescriptor,
} from '../models/index.js';

/**
 * Fields carried by almost every webhook payload. Event descriptors spread
 * this shape and add their own fields.
 */
export const baseEventShape = {
  action: t.string().optional(),
  sender: t.record(() => userDescriptor).optional(),
  repository: t.record(() => repositoryDescriptor).optional(),
  organization: t.record(() => organizationDescriptor).optional(),
  enterprise: t.record(() => enterpriseDescriptor).optional(),
  installation: t.record(() => installationDescriptor).optional(),
};

/**
 * Account reference. Every field is optional and lenient: a value of the
 * wrong type is read as absent and kept with the unrecognized fields.
 */
export const accountRefDescriptor = defineRecord(
  'AccountRef',
  {
    id: t.integer().optional(),
    login: t.string().optional(),
    nodeId: t.string().from('node_id').optional(),
  },
  { lenient: true },
);

/** Repository reference keeping only what routing needs. */
export const repositoryRefDescriptor = defineRecord(
  'RepositoryRef',
  {
    id: t.integer().optional(),
    name: t.string().optional(),
    fullName: t.string().from('full_name').optional(),
  },
  { lenient: true },
);

export const installationRefDescriptor = defineRecord(
  'InstallationRef',
  {
    id: t.integer().optional(),
    nodeId: t.string().from('node_id').optional(),
  },
  { lenient: true },
);

/**
 * Envelope used when the event name is unknown or the specific descriptor
 * rejected the payload. It accepts any JSON object: fields of the wrong
 * type are read as absent, and everything beyond these fields stays
 * reachable through `unrecognizedFields`.
 */
export const fallbackEventDescriptor = defineRecord(
  'FallbackEvent',
  {
    action: t.string().optional(),
    sender: t.record(() => accountRefDescriptor).optional(),
    repository: t.record(() => repositoryRefDescriptor).optional(),
    organization: t.record(() => accountRefDescriptor).optional(),
    enterprise: t.record(() => accountRefDescriptor).optional(),
    installation: t.record(() => installationRefDescriptor).optional(),
  },
  { lenient: true },
);

export type FallbackEvent = RecordOf<typeof fallbackEventDescriptor>;
