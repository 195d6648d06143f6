/**
 * Flash Messages
 *
 * Keyed, ordered user-facing messages that live for the current request
 * and, when persisted, exactly one more. A key without messages behaves
 * like an absent key: reads return an empty list, nothing throws.
 */

export type SerializedFlash = Record<string, string[]>;

export interface SerializeOptions {
  /** Also keep every message written during this request (used for redirects). */
  keepWritten?: boolean;
}

interface FlashMessage {
  readonly text: string;
  /** Written during this request rather than hydrated from the session. */
  readonly fresh: boolean;
  kept: boolean;
}

export class FlashStore {
  private readonly messages = new Map<string, FlashMessage[]>();

  /**
   * Rebuild a store from its session form. Anything that is not a map of
   * string lists is ignored.
   */
  static hydrate(data: unknown): FlashStore {
    const store = new FlashStore();
    if (typeof data !== 'object' || data === null || Array.isArray(data)) {
      return store;
    }

    for (const [key, value] of Object.entries(data)) {
      if (!Array.isArray(value)) continue;
      const messages = value
        .filter((m): m is string => typeof m === 'string')
        .map((text): FlashMessage => ({ text, fresh: false, kept: false }));
      if (messages.length > 0) {
        store.messages.set(key, messages);
      }
    }
    return store;
  }

  put(key: string, message: string): this {
    const entry: FlashMessage = { text: message, fresh: true, kept: false };
    const list = this.messages.get(key);
    if (list) {
      list.push(entry);
    } else {
      this.messages.set(key, [entry]);
    }
    return this;
  }

  /**
   * First message for `key`, or `undefined`
   */
  get(key: string): string | undefined {
    return this.messages.get(key)?.[0]?.text;
  }

  getAll(key: string): string[] {
    return (this.messages.get(key) ?? []).map((m) => m.text);
  }

  /**
   * Return and remove every message for `key`
   */
  popAll(key: string): string[] {
    const list = this.getAll(key);
    this.messages.delete(key);
    return list;
  }

  /**
   * Keep the messages `key` holds now for the next request only.
   * Messages put afterwards are not covered.
   */
  persist(key: string): this {
    for (const message of this.messages.get(key) ?? []) {
      message.kept = true;
    }
    return this;
  }

  clear(): this {
    this.messages.clear();
    return this;
  }

  has(key: string): boolean {
    return this.messages.has(key);
  }

  keys(): string[] {
    return [...this.messages.keys()];
  }

  get isEmpty(): boolean {
    return this.messages.size === 0;
  }

  /**
   * Messages to carry into the session, or `null` when there are none.
   * Hydrated messages are only carried when persisted again.
   */
  serialize(options: SerializeOptions = {}): SerializedFlash | null {
    const result: SerializedFlash = {};
    for (const [key, list] of this.messages) {
      const carried = list
        .filter((m) => m.kept || (options.keepWritten === true && m.fresh))
        .map((m) => m.text);
      if (carried.length > 0) {
        result[key] = carried;
      }
    }
    return Object.keys(result).length > 0 ? result : null;
  }

  toJSON(): SerializedFlash {
    const result: SerializedFlash = {};
    for (const key of this.messages.keys()) {
      result[key] = this.getAll(key);
    }
    return result;
  }
}
