/**
 * Session Management
 *
 * Per-request session data identified by a cookie and persisted through a
 * pluggable {@link SessionStore}.
 */

import { randomUUID } from 'node:crypto';

export interface SessionData {
  [key: string]: unknown;
}

export interface SessionOptions {
  name?: string;
  /** Lifetime in seconds. */
  maxAge?: number;
  secure?: boolean;
  httpOnly?: boolean;
  sameSite?: 'Strict' | 'Lax' | 'None';
  path?: string;
  domain?: string;
}

export const DEFAULT_SESSION_OPTIONS: Required<Omit<SessionOptions, 'domain'>> = {
  name: 'gantry_session',
  maxAge: 86400 * 7,
  secure: true,
  httpOnly: true,
  sameSite: 'Lax',
  path: '/',
};

/**
 * Where session data lives between requests
 */
export interface SessionStore {
  load(id: string): Promise<SessionData | null>;
  save(id: string, data: SessionData, maxAge: number): Promise<void>;
  destroy(id: string): Promise<void>;
}

export class Session {
  private id: string;
  private data: SessionData = {};
  private isNew: boolean;
  private isModified = false;
  private previousId: string | null = null;
  private readonly options: SessionOptions;

  constructor(id: string | null, options: SessionOptions = {}) {
    this.id = id ?? randomUUID();
    this.isNew = id === null;
    this.options = { ...DEFAULT_SESSION_OPTIONS, ...options };
  }

  getId(): string {
    return this.id;
  }

  getIsNew(): boolean {
    return this.isNew;
  }

  getIsModified(): boolean {
    return this.isModified;
  }

  get(key: string): unknown {
    return this.data[key];
  }

  set(key: string, value: unknown): void {
    this.data[key] = value;
    this.isModified = true;
  }

  delete(key: string): void {
    if (!(key in this.data)) return;
    delete this.data[key];
    this.isModified = true;
  }

  has(key: string): boolean {
    return key in this.data;
  }

  clear(): void {
    this.data = {};
    this.isModified = true;
  }

  all(): SessionData {
    return { ...this.data };
  }

  /**
   * Load stored data; a session id the store does not know starts over
   * with a fresh id.
   */
  async load(store: SessionStore): Promise<void> {
    const stored = await store.load(this.id);
    if (stored) {
      this.data = { ...stored };
      this.isNew = false;
    } else {
      this.id = randomUUID();
      this.isNew = true;
    }
  }

  async save(store: SessionStore): Promise<void> {
    if (this.previousId !== null) {
      await store.destroy(this.previousId);
      this.previousId = null;
    }
    if (!this.isModified && !this.isNew) {
      return;
    }
    await store.save(this.id, this.data, this.options.maxAge ?? DEFAULT_SESSION_OPTIONS.maxAge);
    this.isNew = false;
    this.isModified = false;
  }

  /**
   * Issue a new id (after login). The old id is destroyed on save.
   */
  regenerate(): void {
    if (!this.isNew && this.previousId === null) {
      this.previousId = this.id;
    }
    this.id = randomUUID();
    this.isNew = true;
    this.isModified = true;
  }

  /**
   * Set-Cookie header value carrying the session id
   */
  toCookie(): string {
    const parts = [`${this.options.name}=${encodeURIComponent(this.id)}`];

    if (this.options.maxAge) {
      parts.push(`Max-Age=${this.options.maxAge}`);
    }
    if (this.options.path) {
      parts.push(`Path=${this.options.path}`);
    }
    if (this.options.domain) {
      parts.push(`Domain=${this.options.domain}`);
    }
    if (this.options.secure) {
      parts.push('Secure');
    }
    if (this.options.httpOnly) {
      parts.push('HttpOnly');
    }
    if (this.options.sameSite) {
      parts.push(`SameSite=${this.options.sameSite}`);
    }

    return parts.join('; ');
  }
}

interface StoredSession {
  data: SessionData;
  expiresAt: number;
}

/**
 * In-process session store with expiry
 */
export class MemorySessionStore implements SessionStore {
  private readonly sessions = new Map<string, StoredSession>();
  private readonly now: () => number;

  constructor(now: () => number = Date.now) {
    this.now = now;
  }

  async load(id: string): Promise<SessionData | null> {
    const stored = this.sessions.get(id);
    if (!stored) return null;
    if (stored.expiresAt <= this.now()) {
      this.sessions.delete(id);
      return null;
    }
    return structuredClone(stored.data);
  }

  async save(id: string, data: SessionData, maxAge: number): Promise<void> {
    const now = this.now();
    this.sweep(now);
    this.sessions.set(id, {
      data: structuredClone(data),
      expiresAt: now + maxAge * 1000,
    });
  }

  async destroy(id: string): Promise<void> {
    this.sessions.delete(id);
  }

  get size(): number {
    return this.sessions.size;
  }

  private sweep(now: number): void {
    for (const [id, stored] of this.sessions) {
      if (stored.expiresAt <= now) {
        this.sessions.delete(id);
      }
    }
  }
}
