/**
 * Request Context
 *
 * Carries one request/response exchange through a controller pipeline:
 * request data, response status and headers, template assigns, session,
 * flash and the negotiated format.
 *
 * `committed` only ever goes from false to true. Once it is set, any
 * attempt to change status, headers or body throws {@link DoubleCommitError}.
 * `halted` stops the remaining pipeline stages without sending anything.
 */

import { randomUUID } from 'node:crypto';
import type { FlashStore } from '../flash/flash.ts';
import type { Session } from '../session/session.ts';
import { getLogger, type Logger } from '../telemetry/logger.ts';
import type { RenderDispatcher } from '../view/dispatcher.ts';
import {
  DoubleCommitError,
  FlashNotFetchedError,
  RequestAbortedError,
  SessionNotFetchedError,
} from './errors.ts';
import type { Format } from './formats.ts';
import { readRequest, type Params } from './request.ts';
import type { StatusInput } from './status.ts';

type HeadersInput = ConstructorParameters<typeof Headers>[0];

export type BeforeSendCallback = (ctx: Context) => void;
export type AfterSendCallback = (ctx: Context) => void | Promise<void>;

export interface ContextOptions {
  method?: string;
  url?: string | URL;
  headers?: HeadersInput;
  cookies?: Map<string, string>;
  queryParams?: Record<string, string>;
  bodyParams?: Params;
  pathParams?: Record<string, string>;
  signal?: AbortSignal;
  logger?: Logger;
  renderer?: RenderDispatcher;
  requestId?: string;
}

export class Context {
  readonly requestId: string;
  readonly method: string;
  readonly url: URL;
  readonly path: string;
  readonly requestHeaders: Headers;
  readonly cookies: Map<string, string>;
  readonly queryParams: Readonly<Record<string, string>>;
  readonly bodyParams: Readonly<Params>;
  readonly pathParams: Readonly<Record<string, string>>;
  /** Path, body and query params merged, in that order of precedence. */
  readonly params: Readonly<Params>;
  readonly signal: AbortSignal;
  /** Values shared between stages that are not template assigns. */
  readonly state = new Map<string, unknown>();
  readonly assigns: Record<string, unknown> = {};

  logger: Logger;
  renderer?: RenderDispatcher;

  controller = '';
  action = '';
  acceptedFormats?: readonly Format[];
  /** Format negotiated from the request, set by `acceptFormats` and by rendering. */
  format?: Format;
  /** Format set explicitly by the action; wins over negotiation. */
  formatOverride?: Format;
  layout?: string | false;
  /** Template namespace override; defaults to the controller namespace. */
  view?: string;

  private _status?: StatusInput;
  private readonly _headers = new Headers();
  private _body: string | null = null;
  private _halted = false;
  private _committed = false;
  private _sending = false;
  private _session?: Session;
  private _flash?: FlashStore;
  private readonly beforeSend: BeforeSendCallback[] = [];
  private readonly afterSend: AfterSendCallback[] = [];

  constructor(options: ContextOptions = {}) {
    this.requestId = options.requestId ?? randomUUID();
    this.method = (options.method ?? 'GET').toUpperCase();
    this.url = new URL(options.url ?? 'http://localhost/');
    this.path = this.url.pathname;
    this.requestHeaders = new Headers(options.headers);
    this.cookies = options.cookies ?? new Map();
    this.queryParams = options.queryParams ?? {};
    this.bodyParams = options.bodyParams ?? {};
    this.pathParams = options.pathParams ?? {};
    this.params = { ...this.queryParams, ...this.bodyParams, ...this.pathParams };
    this.signal = options.signal ?? new AbortController().signal;
    this.logger = options.logger ?? getLogger();
    this.renderer = options.renderer;
  }

  /**
   * Build a Context from a Fetch request and the router's path params
   */
  static async fromRequest(
    request: Request,
    options: Omit<ContextOptions, 'method' | 'url' | 'headers' | 'cookies' | 'queryParams' | 'bodyParams'> = {}
  ): Promise<Context> {
    const data = await readRequest(request, options.pathParams);
    return new Context({
      ...options,
      method: data.method,
      url: data.url,
      headers: data.headers,
      cookies: data.cookies,
      queryParams: data.queryParams,
      bodyParams: data.bodyParams,
      signal: options.signal ?? request.signal,
    });
  }

  get status(): StatusInput | undefined {
    return this._status;
  }

  get body(): string | null {
    return this._body;
  }

  get halted(): boolean {
    return this._halted;
  }

  get committed(): boolean {
    return this._committed;
  }

  get aborted(): boolean {
    return this.signal.aborted;
  }

  /**
   * Set the response status. Any value is accepted here; it is checked
   * against the status table when the response is committed.
   */
  putStatus(status: StatusInput): this {
    this.assertWritable('set the status');
    this._status = status;
    return this;
  }

  putRespHeader(name: string, value: string): this {
    this.assertWritable(`set header '${name}'`);
    this._headers.set(name, value);
    return this;
  }

  appendRespHeader(name: string, value: string): this {
    this.assertWritable(`append header '${name}'`);
    this._headers.append(name, value);
    return this;
  }

  deleteRespHeader(name: string): this {
    this.assertWritable(`delete header '${name}'`);
    this._headers.delete(name);
    return this;
  }

  getRespHeader(name: string): string | null {
    return this._headers.get(name);
  }

  /**
   * Copy of the response headers
   */
  respHeaders(): Headers {
    return new Headers(this._headers);
  }

  /**
   * Merge values into the template assigns
   */
  assign(key: string, value: unknown): this;
  assign(values: Record<string, unknown>): this;
  assign(keyOrValues: string | Record<string, unknown>, value?: unknown): this {
    if (typeof keyOrValues === 'string') {
      this.assigns[keyOrValues] = value;
    } else {
      Object.assign(this.assigns, keyOrValues);
    }
    return this;
  }

  /**
   * Assign a value computed by `compute` only when `key` is not assigned yet
   */
  assignNew(key: string, compute: () => unknown): this {
    if (!(key in this.assigns)) {
      this.assigns[key] = compute();
    }
    return this;
  }

  /**
   * Stop the remaining pipeline stages. Does not send a response.
   */
  halt(): this {
    this._halted = true;
    return this;
  }

  get session(): Session {
    if (!this._session) throw new SessionNotFetchedError();
    return this._session;
  }

  get hasSession(): boolean {
    return this._session !== undefined;
  }

  putSession(session: Session): this {
    this._session = session;
    return this;
  }

  get flash(): FlashStore {
    if (!this._flash) throw new FlashNotFetchedError();
    return this._flash;
  }

  get hasFlash(): boolean {
    return this._flash !== undefined;
  }

  putFlashStore(store: FlashStore): this {
    this._flash = store;
    return this;
  }

  /**
   * Run `callback` while the response is committed, before it is frozen.
   * Callbacks run last-registered first.
   */
  registerBeforeSend(callback: BeforeSendCallback): this {
    this.assertWritable('register a before-send callback');
    this.beforeSend.push(callback);
    return this;
  }

  /**
   * Run `callback` after the response was committed and the request was
   * not aborted.
   */
  registerAfterSend(callback: AfterSendCallback): this {
    this.afterSend.push(callback);
    return this;
  }

  throwIfAborted(stage?: string): void {
    if (this.signal.aborted) {
      throw new RequestAbortedError(stage);
    }
  }

  assertWritable(operation: string): void {
    if (this._committed) {
      throw new DoubleCommitError(operation);
    }
  }

  /**
   * @internal Used by the response finalizer.
   */
  runBeforeSend(): void {
    if (this._sending) {
      throw new DoubleCommitError('send a response from a before-send callback');
    }

    this._sending = true;
    try {
      for (const callback of [...this.beforeSend].reverse()) {
        callback(this);
      }
    } finally {
      this._sending = false;
    }
  }

  /**
   * @internal Used by the response finalizer.
   */
  markCommitted(status: number, body: string | null): void {
    this.assertWritable('send a response');
    this._status = status;
    this._body = body;
    this._committed = true;
  }

  /**
   * @internal Used by the application after a successful commit.
   */
  async runAfterSend(): Promise<void> {
    for (const callback of this.afterSend) {
      await callback(this);
    }
  }
}
