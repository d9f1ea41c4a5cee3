import { defineRecord, t } from '../descriptor.js';
import type { RecordOf } from '../descriptor.js';

/** The webhook configuration itself, as sent with `ping` and `meta`. */
export const hookDescriptor = defineRecord('Hook', {
  id: t.integer(),
  type: t.string(),
  name: t.string(),
  active: t.boolean(),
  events: t.strings(),
  config: t.openMap(),
  createdAt: t.string().from('created_at').optional(),
  updatedAt: t.string().from('updated_at').optional(),
  url: t.string().optional(),
  pingUrl: t.string().from('ping_url').optional(),
});

export type Hook = RecordOf<typeof hookDescriptor>;

/** A wiki page touched by a `gollum` event. */
export const pageDescriptor = defineRecord('Page', {
  pageName: t.string().from('page_name'),
  title: t.string(),
  action: t.string(),
  sha: t.string(),
  htmlUrl: t.string().from('html_url'),
  summary: t.string().optional(),
});

export type Page = RecordOf<typeof pageDescriptor>;
