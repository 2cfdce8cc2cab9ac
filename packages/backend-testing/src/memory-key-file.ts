import type { KeyFile } from '@pkbridge/backend-contracts';

/**
 * Key file backed by a plain `{ group: { key: value } }` object.
 */
export class MemoryKeyFile implements KeyFile {
  constructor(private readonly groups: Record<string, Record<string, string>> = {}) {}

  getString(group: string, key: string): string | undefined {
    return this.groups[group]?.[key];
  }
}
