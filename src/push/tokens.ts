import { customAlphabet } from 'nanoid';

export const TOKEN_ALPHABET = 'abcdefghijklmnopqrstuvwxyz0123456789';
export const TOKEN_SEPARATOR = '_';

export interface TokenRegistryOptions {
  suffixLength?: number;
  /** Bindings kept before the oldest is evicted. */
  maxEntries?: number;
}

/**
 * Short-lived tokens that stand in for a list of item IDs in action buttons.
 * Tokens are `<prefix>_<random suffix>`. Nothing is persisted: after a restart
 * every outstanding token resolves to undefined. Past `maxEntries` the oldest
 * binding is dropped and its token behaves as expired.
 */
export class TokenRegistry {
  private readonly bindings = new Map<string, string[]>();
  private readonly suffix: () => string;
  private readonly maxEntries: number;

  constructor(opts: TokenRegistryOptions = {}) {
    this.suffix = customAlphabet(TOKEN_ALPHABET, opts.suffixLength ?? 6);
    this.maxEntries = opts.maxEntries ?? 10_000;
  }

  allocate(prefix: string): string {
    return `${prefix}${TOKEN_SEPARATOR}${this.suffix()}`;
  }

  /** Last writer wins on collision. */
  bind(token: string, itemIds: readonly string[]): void {
    this.bindings.delete(token);
    this.bindings.set(token, [...itemIds]);
    for (const oldest of this.bindings.keys()) {
      if (this.bindings.size <= this.maxEntries) break;
      this.bindings.delete(oldest);
    }
  }

  /** allocate + bind. */
  register(prefix: string, itemIds: readonly string[]): string {
    const token = this.allocate(prefix);
    this.bind(token, itemIds);
    return token;
  }

  resolve(token: string): string[] | undefined {
    const ids = this.bindings.get(token);
    return ids ? [...ids] : undefined;
  }

  consumeOnce(token: string): string[] | undefined {
    const ids = this.bindings.get(token);
    if (!ids) return undefined;
    this.bindings.delete(token);
    return ids;
  }

  has(token: string): boolean {
    return this.bindings.has(token);
  }

  get size(): number {
    return this.bindings.size;
  }
}

/**
 * True for `<prefix>_<suffix>` tokens minted by a registry, as opposed to a bare item ID.
 */
export function isNamespacedToken(token: string): boolean {
  return token.includes(TOKEN_SEPARATOR);
}
