import type { HookRegistry } from '../../../../src/application/index.js';
import { tag } from '../_helper.js';

export async function registerHooks(registry: HookRegistry): Promise<void> {
  await Promise.resolve();
  registry.register('pull_request', () => undefined, { actions: ['opened'], name: tag('pr-opened') });
}
