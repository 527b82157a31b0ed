import type { ReadableStream } from "node:stream/web";
import { Agent, Dispatcher, fetch as undiciFetch } from "undici";

export interface HttpResponseLike {
  ok: boolean;
  status: number;
  url: string;
  headers: { get(name: string): string | null };
  body: ReadableStream<Uint8Array> | null;
  text(): Promise<string>;
}

export interface HttpRequestInit {
  method: "GET" | "HEAD";
  headers: Record<string, string>;
  signal: AbortSignal;
  redirect: "follow";
  dispatcher?: Dispatcher;
}

export type FetchLike = (url: string, init: HttpRequestInit) => Promise<HttpResponseLike>;

let insecureAgent: Agent | undefined;

function getInsecureAgent(): Agent {
  if (!insecureAgent) {
    insecureAgent = new Agent({
      connect: {
        rejectUnauthorized: false,
      },
    });
  }
  return insecureAgent;
}

export function getFetchDispatcher(ignoreHttpsErrors: boolean): Dispatcher | undefined {
  if (!ignoreHttpsErrors) {
    return undefined;
  }
  return getInsecureAgent();
}

export const defaultFetch: FetchLike = (url, init) => undiciFetch(url, init);

export async function closeFetchDispatchers(): Promise<void> {
  if (insecureAgent) {
    const agent = insecureAgent;
    insecureAgent = undefined;
    await agent.close();
  }
}
