import type { EventName } from './catalogue.js';

/** Event names as constants, for `hook(WebhookEvent.PullRequest, ...)`. */
export const WebhookEvent = {
  CheckRun: 'check_run',
  CheckSuite: 'check_suite',
  CommitComment: 'commit_comment',
  Create: 'create',
  Delete: 'delete',
  Deployment: 'deployment',
  DeploymentStatus: 'deployment_status',
  Fork: 'fork',
  Gollum: 'gollum',
  Installation: 'installation',
  InstallationRepositories: 'installation_repositories',
  IssueComment: 'issue_comment',
  Issues: 'issues',
  Label: 'label',
  Member: 'member',
  Membership: 'membership',
  Meta: 'meta',
  Milestone: 'milestone',
  OrgBlock: 'org_block',
  Organization: 'organization',
  Ping: 'ping',
  Public: 'public',
  PullRequest: 'pull_request',
  PullRequestReview: 'pull_request_review',
  PullRequestReviewComment: 'pull_request_review_comment',
  Push: 'push',
  Release: 'release',
  Repository: 'repository',
  RepositoryDispatch: 'repository_dispatch',
  SecurityAdvisory: 'security_advisory',
  Star: 'star',
  Status: 'status',
  Team: 'team',
  TeamAdd: 'team_add',
  Watch: 'watch',
} as const satisfies Record<string, EventName>;

/** Common `action` values. Filters accept any string; these are conveniences. */
export const WebhookAction = {
  Added: 'added',
  Assigned: 'assigned',
  Closed: 'closed',
  Created: 'created',
  Deleted: 'deleted',
  Dismissed: 'dismissed',
  Edited: 'edited',
  Labeled: 'labeled',
  Opened: 'opened',
  Published: 'published',
  Reopened: 'reopened',
  Removed: 'removed',
  ReviewRequested: 'review_requested',
  Submitted: 'submitted',
  Synchronize: 'synchronize',
  Unassigned: 'unassigned',
  Unlabeled: 'unlabeled',
} as const;

export type WebhookAction = (typeof WebhookAction)[keyof typeof WebhookAction];
