import type { TemplateArg } from '../domain/index.js';

/** One `(name, value)` pair, in the order the accessor declared it. */
export type TemplateParam = readonly [name: string, value: TemplateArg];

/**
 * Fills hypermedia URL templates such as
 * `https://api.github.com/users/octocat/following{/other_user}`.
 *
 * - `{name}` is replaced inline with the value.
 * - `{/name}` is an optional path segment, rendered as `/value`, or as
 *   `value` when the template already has a `/` right before it.
 * - An absent value (`null`/`undefined`) or an empty string cuts the
 *   template at `{/name}` and stops; later parameters are not applied.
 *   `0` and `false` are values, not absence.
 *
 * Pure; no shared state.
 */
export function interpolate(template: string, params: Iterable<TemplateParam>): string {
  let url = template;

  for (const [name, value] of params) {
    const segment = `{/${name}}`;

    if (value === null || value === undefined || value === '') {
      const cut = url.indexOf(segment);
      return cut === -1 ? url : url.slice(0, cut);
    }

    const text = String(value);
    const inline = `{${name}}`;

    if (url.includes(inline)) {
      url = url.replaceAll(inline, text);
    } else if (url.includes(segment)) {
      url = url.replaceAll(segment, (_match: string, offset: number, whole: string) =>
        whole[offset - 1] === '/' ? text : `/${text}`,
      );
    }
  }

  return url;
}
