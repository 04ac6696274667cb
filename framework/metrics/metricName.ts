export type TagInput = Readonly<Record<string, unknown>> | ReadonlyMap<string, unknown>;

export type TagSet = Map<string, string>;

/**
 * String conversion for tag values. Never throws: values whose own
 * `toString` fails fall back to the `[object Type]` form.
 */
export function stringifyTagValue(value: unknown): string {
  try {
    return String(value);
  } catch {
    return Object.prototype.toString.call(value);
  }
}

function entriesOf(tags: TagInput): Iterable<[string, unknown]> {
  return tags instanceof Map ? tags.entries() : Object.entries(tags);
}

/** Copies `tags` into a fresh tag set, stringifying the values. */
export function toTagSet(tags: TagInput = {}): TagSet {
  return mergeTags(new Map(), tags);
}

/**
 * Writes `extra` into `target` in place. Existing keys keep their position
 * and take the new value; new keys are appended.
 */
export function mergeTags(target: TagSet, extra: TagInput): TagSet {
  for (const [key, value] of entriesOf(extra)) {
    target.set(key, stringifyTagValue(value));
  }
  return target;
}

export function formatTags(tags: Iterable<[string, string]>): string {
  const pairs: string[] = [];
  for (const [key, value] of tags) {
    pairs.push(`${key}=${value}`);
  }
  return pairs.join(',');
}

/**
 * `<base>,<k1>=<v1>,...,name=<name>`; the call-site `name` tag always goes
 * last, after the tag set in insertion order.
 */
export function composeMetricName(base: string, tags: TagSet, name: string): string {
  const withName = new Map(tags);
  withName.delete('name');
  withName.set('name', name);
  return `${base},${formatTags(withName)}`;
}
