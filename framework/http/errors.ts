/**
 * Framework Errors
 *
 * Every error raised while handling a request carries the HTTP status the
 * application answers with. None of them is retried or swallowed.
 */

import { reasonPhrase } from './status.ts';

export interface ErrorPayload {
  success: false;
  error: {
    code: string;
    message: string;
    details?: Record<string, unknown>;
  };
}

export class HttpError extends Error {
  readonly status: number;
  readonly code: string;
  readonly details?: Record<string, unknown>;

  constructor(status: number, code: string, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'HttpError';
    this.status = status;
    this.code = code;
    this.details = details;
  }

  /**
   * Client errors expose their message; server errors only the reason phrase
   */
  get expose(): boolean {
    return this.status < 500;
  }

  toPayload(): ErrorPayload {
    if (!this.expose) {
      return { success: false, error: { code: this.code, message: reasonPhrase(this.status) } };
    }
    return {
      success: false,
      error: { code: this.code, message: this.message, details: this.details },
    };
  }
}

/**
 * A response was committed, or mutated after commit, more than once
 */
export class DoubleCommitError extends HttpError {
  readonly operation: string;

  constructor(operation: string) {
    super(500, 'DOUBLE_COMMIT', `Cannot ${operation}: the response has already been sent`, {
      operation,
    });
    this.name = 'DoubleCommitError';
    this.operation = operation;
  }
}

export interface ResolutionKeyLike {
  namespace: string;
  template: string;
  format: string;
}

export class TemplateNotFoundError extends HttpError {
  readonly key: ResolutionKeyLike;

  constructor(key: ResolutionKeyLike) {
    const path = `${key.namespace}/${key.template}.${key.format}`;
    super(500, 'TEMPLATE_NOT_FOUND', `Template not found: ${path}`, { ...key, path });
    this.name = 'TemplateNotFoundError';
    this.key = key;
  }
}

export class UnsupportedFormatError extends HttpError {
  readonly format: string;
  readonly accepted: readonly string[];

  constructor(format: string, accepted: readonly string[]) {
    super(
      406,
      'UNSUPPORTED_FORMAT',
      `Format '${format}' is not accepted (accepted: ${accepted.join(', ')})`,
      { format, accepted: [...accepted] }
    );
    this.name = 'UnsupportedFormatError';
    this.format = format;
    this.accepted = accepted;
  }
}

export class InvalidStatusError extends HttpError {
  readonly input: number | string;

  constructor(input: number | string) {
    super(500, 'INVALID_STATUS', `Unrecognized HTTP status: ${JSON.stringify(input)}`, { input });
    this.name = 'InvalidStatusError';
    this.input = input;
  }
}

export class RedirectMisuseError extends HttpError {
  constructor(kind: 'to' | 'external', destination: string, reason: string) {
    super(500, 'REDIRECT_MISUSE', `Invalid ${kind} redirect to '${destination}': ${reason}`, {
      kind,
      destination,
    });
    this.name = 'RedirectMisuseError';
  }
}

export class UnknownActionError extends HttpError {
  constructor(controller: string, action: string) {
    super(404, 'UNKNOWN_ACTION', `Controller '${controller}' has no action '${action}'`, {
      controller,
      action,
    });
    this.name = 'UnknownActionError';
  }
}

/**
 * The pipeline finished without committing a response
 */
export class NoResponseError extends HttpError {
  constructor(controller: string, action: string, halted: boolean) {
    super(
      500,
      'NO_RESPONSE',
      `${controller}#${action} finished without sending a response${halted ? ' (halted)' : ''}`,
      { controller, action, halted }
    );
    this.name = 'NoResponseError';
  }
}

export class SessionNotFetchedError extends HttpError {
  constructor() {
    super(500, 'SESSION_NOT_FETCHED', 'Session accessed before the fetchSession stage ran');
    this.name = 'SessionNotFetchedError';
  }
}

export class FlashNotFetchedError extends HttpError {
  constructor() {
    super(500, 'FLASH_NOT_FETCHED', 'Flash accessed before the fetchFlash stage ran');
    this.name = 'FlashNotFetchedError';
  }
}

/**
 * The transport cancelled the request; no response is produced
 */
export class RequestAbortedError extends Error {
  readonly stage?: string;

  constructor(stage?: string) {
    super(stage ? `Request aborted before stage '${stage}'` : 'Request aborted');
    this.name = 'RequestAbortedError';
    this.stage = stage;
  }
}

export class PipelineSealedError extends Error {
  constructor(pipeline: string) {
    super(`Pipeline '${pipeline}' is sealed; stages must be registered before the first request`);
    this.name = 'PipelineSealedError';
  }
}

export class ControllerDefinitionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ControllerDefinitionError';
  }
}
