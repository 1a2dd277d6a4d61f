import { vi } from "vitest";

export interface RecordedCall {
  url: string;
  init: RequestInit | undefined;
  bodyText: string;
}

type Reply = Response | Error;

export const jsonResponse = (body: unknown, status = 200) =>
  new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json" } });

export const completion = (content: string) =>
  jsonResponse({ choices: [{ index: 0, message: { role: "assistant", content } }] });

export const imageResponse = (b64: string) => jsonResponse({ created: 1, data: [{ b64_json: b64 }] });

/** Replaces global fetch; replies are consumed in order. */
export const stubFetch = (...replies: Reply[]) => {
  const calls: RecordedCall[] = [];
  const queue = [...replies];
  const fetchMock = vi.fn(async (input: RequestInfo | URL, init?: RequestInit) => {
    const url = typeof input === "string" ? input : input instanceof URL ? input.href : input.url;
    calls.push({ url, init, bodyText: typeof init?.body === "string" ? init.body : "" });
    const next = queue.shift();
    if (!next) throw new Error(`Unexpected fetch to ${url}`);
    if (next instanceof Error) throw next;
    return next;
  });
  vi.stubGlobal("fetch", fetchMock);
  return { calls, fetchMock };
};

/** A fetch that only settles when its request is aborted. */
export const stubHangingFetch = () => {
  const fetchMock = vi.fn(
    (_input: RequestInfo | URL, init?: RequestInit) =>
      new Promise<Response>((_resolve, reject) => {
        init?.signal?.addEventListener("abort", () => reject(new DOMException("The operation was aborted.", "AbortError")));
      }),
  );
  vi.stubGlobal("fetch", fetchMock);
  return fetchMock;
};

export const silenceConsole = () => {
  vi.spyOn(console, "warn").mockImplementation(() => undefined);
  vi.spyOn(console, "error").mockImplementation(() => undefined);
};
