/**
 * HTTP transport for the object store, on undici.
 *
 * Connection reuse is disabled: S3 has been seen to corrupt a GET that
 * follows another one on a kept-alive connection.
 */

import { Agent, request, type Dispatcher } from "undici";
import { TransportError } from "../errors/catalog.js";
import type { SignedRequest } from "../signing/request-signer.js";

export type HttpResponse = Dispatcher.ResponseData;

export interface DispatcherOptions {
  /** Milliseconds to wait for the TCP/TLS connection. undici default when unset. */
  connectTimeout?: number;
}

/** One connection per request: `pipelining: 0` turns keep-alive off. */
export function createDispatcher(options: DispatcherOptions = {}): Dispatcher {
  return new Agent({
    pipelining: 0,
    ...(options.connectTimeout !== undefined
      ? { connectTimeout: options.connectTimeout }
      : {}),
  });
}

/** Sends a signed request once. Any failure below HTTP becomes TransportError. */
export async function send(
  dispatcher: Dispatcher,
  signed: SignedRequest,
): Promise<HttpResponse> {
  try {
    return await request(signed.url, {
      dispatcher,
      method: signed.method,
      headers: signed.headers,
      ...(signed.body !== undefined ? { body: signed.body } : {}),
    });
  } catch (err: unknown) {
    throw new TransportError(err);
  }
}

/** Reads the whole response body as UTF-8. */
export async function readText(response: HttpResponse): Promise<string> {
  try {
    return await response.body.text();
  } catch (err: unknown) {
    throw new TransportError(err);
  }
}

/** Drains a body nobody will read so the socket is released. */
export async function discard(response: HttpResponse): Promise<void> {
  try {
    await response.body.dump();
  } catch (err: unknown) {
    throw new TransportError(err);
  }
}
