/**
 * @relaygate/models - HTTP transport for completion adapters
 *
 * POSTs JSON with the global fetch and turns every failure into the adapter
 * error taxonomy. An abort is rethrown untouched so the Execution Client can
 * tell a deadline from a cancellation.
 */

import {
  MalformedResponseError,
  TransportError,
  adapterErrorFromStatus,
  errorMessage,
  truncate,
} from '@relaygate/core';

export async function postJson(
  url: string,
  body: unknown,
  options: { headers?: Record<string, string>; signal: AbortSignal },
): Promise<unknown> {
  let response: Response;
  try {
    response = await fetch(url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json', ...options.headers },
      body: JSON.stringify(body),
      signal: options.signal,
    });
  } catch (err) {
    if (options.signal.aborted) throw err;
    throw new TransportError(`Request to ${url} failed: ${errorMessage(err)}`, { cause: err });
  }

  const text = await response.text();

  if (!response.ok) {
    throw adapterErrorFromStatus(response.status, `HTTP ${response.status}: ${truncate(text, 300)}`);
  }

  try {
    return JSON.parse(text);
  } catch (err) {
    throw new MalformedResponseError(`Response from ${url} is not JSON: ${truncate(text, 120)}`, { cause: err });
  }
}
