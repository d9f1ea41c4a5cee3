import { defineRecord, t } from '../descriptor.js';
import type { RecordOf } from '../descriptor.js';
import { userDescriptor } from './accounts.js';

export const assetDescriptor = defineRecord('Asset', {
  id: t.integer(),
  name: t.string(),
  url: t.string().optional(),
  nodeId: t.string().from('node_id').optional(),
  label: t.string().optional(),
  uploader: t.record(() => userDescriptor).optional(),
  contentType: t.string().from('content_type').optional(),
  state: t.string().optional(),
  size: t.integer().optional(),
  downloadCount: t.integer().from('download_count').optional(),
  createdAt: t.string().from('created_at').optional(),
  updatedAt: t.string().from('updated_at').optional(),
  browserDownloadUrl: t.string().from('browser_download_url').optional(),
});

export type Asset = RecordOf<typeof assetDescriptor>;

export const releaseDescriptor = defineRecord('Release', {
  id: t.integer(),
  tagName: t.string().from('tag_name'),
  author: t.record(() => userDescriptor),
  draft: t.boolean(),
  prerelease: t.boolean(),
  name: t.string().optional(),
  nodeId: t.string().from('node_id').optional(),
  url: t.string().optional(),
  htmlUrl: t.string().from('html_url').optional(),
  assetsUrl: t.string().from('assets_url').optional(),
  uploadUrl: t.string().from('upload_url').optional(),
  targetCommitish: t.string().from('target_commitish').optional(),
  createdAt: t.string().from('created_at').optional(),
  publishedAt: t.string().from('published_at').optional(),
  assets: t.list(() => assetDescriptor).optional(),
  tarballUrl: t.string().from('tarball_url').optional(),
  zipballUrl: t.string().from('zipball_url').optional(),
  body: t.string().optional(),
});

export type Release = RecordOf<typeof releaseDescriptor>;
