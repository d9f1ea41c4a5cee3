import { defineRecord, t } from '../descriptor.js';
import type { RecordOf } from '../descriptor.js';

export const advisoryIdentifierDescriptor = defineRecord('AdvisoryIdentifier', {
  type: t.string(),
  value: t.string(),
});

export const advisoryReferenceDescriptor = defineRecord('AdvisoryReference', {
  url: t.string(),
});

export const vulnerablePackageDescriptor = defineRecord('VulnerablePackage', {
  ecosystem: t.string(),
  name: t.string(),
});

export const patchedVersionDescriptor = defineRecord('PatchedVersion', {
  identifier: t.string(),
});

export const vulnerabilityDescriptor = defineRecord('Vulnerability', {
  package: t.record(() => vulnerablePackageDescriptor),
  severity: t.string(),
  vulnerableVersionRange: t.string().from('vulnerable_version_range'),
  firstPatchedVersion: t.record(() => patchedVersionDescriptor).from('first_patched_version').optional(),
});

export type Vulnerability = RecordOf<typeof vulnerabilityDescriptor>;

export const securityAdvisoryDescriptor = defineRecord('SecurityAdvisory', {
  ghsaId: t.string().from('ghsa_id'),
  summary: t.string(),
  severity: t.string(),
  description: t.string().optional(),
  identifiers: t.list(() => advisoryIdentifierDescriptor).optional(),
  references: t.list(() => advisoryReferenceDescriptor).optional(),
  vulnerabilities: t.list(() => vulnerabilityDescriptor).optional(),
  publishedAt: t.string().from('published_at').optional(),
  updatedAt: t.string().from('updated_at').optional(),
  withdrawnAt: t.string().from('withdrawn_at').optional(),
});

export type SecurityAdvisory = RecordOf<typeof securityAdvisoryDescriptor>;
