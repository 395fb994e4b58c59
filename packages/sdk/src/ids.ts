import ulidPkg from 'ulid';

const nextUlid = ulidPkg.monotonicFactory();

export const ID_PREFIXES = {
  thread: 'thread',
  message: 'msg',
  run: 'run',
  runStep: 'step',
  assistant: 'asst',
  file: 'file',
  workflow: 'workflow',
  mcpConfig: 'mcp_config',
  execution: 'wfexec',
} as const;

export type IdPrefix = (typeof ID_PREFIXES)[keyof typeof ID_PREFIXES];

/** Parent id of the first messages in a thread. Sorts before every generated message id. */
export const ROOT_MESSAGE_PARENT_ID = `${ID_PREFIXES.message}_${'0'.repeat(26)}`;

/**
 * Generates `<prefix>_<ulid>`. The ulid suffix is monotonic within the process,
 * so ids sharing a prefix compare lexically in generation order.
 */
export function generateId(prefix: IdPrefix): string {
  return addPrefix(prefix, nextUlid());
}

/**
 * Removes the type prefix. Prefixes may themselves contain underscores
 * (`mcp_config`), suffixes never do, so the split happens on the last one.
 */
export function stripPrefix(id: string): string {
  const index = id.lastIndexOf('_');
  return index === -1 ? id : id.slice(index + 1);
}

export function addPrefix(prefix: string, raw: string): string {
  return `${prefix}_${stripPrefix(raw)}`;
}

export function hasPrefix(id: string, prefix: IdPrefix): boolean {
  return id.startsWith(`${prefix}_`) && stripPrefix(id).length > 0;
}

const ULID_PATTERN = /^[0-9A-HJKMNP-TV-Z]{26}$/;

/** `<prefix>_<ulid>` with a well-formed ulid suffix. */
export function isValidId(id: string, prefix: IdPrefix): boolean {
  return hasPrefix(id, prefix) && ULID_PATTERN.test(stripPrefix(id));
}
