import { defineRecord, t } from '../descriptor.js';
import type { RecordOf } from '../descriptor.js';

/** Git identity as it appears on push commits and the pusher. */
export const commitUserDescriptor = defineRecord('CommitUser', {
  name: t.string(),
  email: t.string().optional(),
  username: t.string().optional(),
  date: t.string().optional(),
});

export type CommitUser = RecordOf<typeof commitUserDescriptor>;

export const commitDescriptor = defineRecord('Commit', {
  id: t.string(),
  message: t.string(),
  timestamp: t.string(),
  author: t.record(() => commitUserDescriptor),
  committer: t.record(() => commitUserDescriptor),
  treeId: t.string().from('tree_id').optional(),
  distinct: t.boolean().optional(),
  url: t.string().optional(),
  added: t.strings().optional(),
  removed: t.strings().optional(),
  modified: t.strings().optional(),
});

export type Commit = RecordOf<typeof commitDescriptor>;
