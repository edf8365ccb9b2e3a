/** A scripted reply: a response to return or an error to throw. */
export type FetchReply = Response | Error | (() => Response);

export interface RecordedRequest {
  readonly url: string;
  readonly method: string;
  readonly headers: Headers;
  readonly body: string | null;
}

/**
 * `fetch` double answering from a script, one reply per call, and recording
 * every request. Running out of replies fails the test loudly.
 */
export function scriptedFetch(replies: readonly FetchReply[]): {
  readonly fetchImpl: typeof fetch;
  readonly requests: RecordedRequest[];
} {
  const queue = [...replies];
  const requests: RecordedRequest[] = [];

  const fetchImpl: typeof fetch = async (input, init) => {
    requests.push({
      url: typeof input === "string" ? input : input instanceof URL ? input.toString() : input.url,
      method: init?.method ?? "GET",
      headers: new Headers(init?.headers),
      body: typeof init?.body === "string" ? init.body : null,
    });
    const next = queue.shift();
    if (next === undefined) {
      throw new Error(`unexpected request #${requests.length}`);
    }
    if (next instanceof Error) {
      throw next;
    }
    return typeof next === "function" ? next() : next;
  };

  return { fetchImpl, requests };
}

export function jsonResponse(value: unknown, status = 200): Response {
  return new Response(JSON.stringify(value), { status, headers: { "Content-Type": "application/json" } });
}

export function textResponse(text: string, status = 200): Response {
  return new Response(text, { status });
}
