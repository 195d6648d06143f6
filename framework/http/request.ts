/**
 * Request Reading
 *
 * Turns a Fetch `Request` into the plain data a Context is built from:
 * path, query and body params, cookies.
 */

import { HttpError } from './errors.ts';

export type Params = Record<string, unknown>;

export interface RequestData {
  method: string;
  url: URL;
  path: string;
  headers: Headers;
  cookies: Map<string, string>;
  queryParams: Record<string, string>;
  bodyParams: Params;
  pathParams: Record<string, string>;
}

/**
 * Parse a `Cookie` header into name/value pairs
 */
export function parseCookies(header: string | null): Map<string, string> {
  const cookies = new Map<string, string>();
  if (!header) return cookies;

  for (const cookie of header.split(';')) {
    const [name, ...rest] = cookie.split('=');
    const trimmed = name?.trim();
    if (trimmed) {
      cookies.set(trimmed, decodeCookieValue(rest.join('=').trim()));
    }
  }

  return cookies;
}

function decodeCookieValue(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch (error) {
    if (error instanceof URIError) return value;
    throw error;
  }
}

/**
 * Collapse search params to single values (last one wins)
 */
export function searchParamsToObject(search: URLSearchParams): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of search) {
    result[key] = value;
  }
  return result;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Read body params from JSON objects and urlencoded forms.
 * Other content types (and bodiless methods) give no params.
 */
export async function readBodyParams(request: Request): Promise<Params> {
  if (request.method === 'GET' || request.method === 'HEAD' || request.body === null) {
    return {};
  }

  const contentType = (request.headers.get('Content-Type') ?? '').toLowerCase();

  if (contentType.includes('application/json')) {
    const text = await request.text();
    if (text.trim() === '') return {};
    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch (error) {
      if (error instanceof SyntaxError) {
        throw new HttpError(400, 'MALFORMED_BODY', `Malformed JSON body: ${error.message}`);
      }
      throw error;
    }
    return isPlainObject(parsed) ? parsed : { _json: parsed };
  }

  if (contentType.includes('application/x-www-form-urlencoded')) {
    return searchParamsToObject(new URLSearchParams(await request.text()));
  }

  return {};
}

export async function readRequest(
  request: Request,
  pathParams: Record<string, string> = {}
): Promise<RequestData> {
  const url = new URL(request.url);
  return {
    method: request.method,
    url,
    path: url.pathname,
    headers: request.headers,
    cookies: parseCookies(request.headers.get('Cookie')),
    queryParams: searchParamsToObject(url.searchParams),
    bodyParams: await readBodyParams(request),
    pathParams,
  };
}
