import { Agent, fetch as undiciFetch } from "undici";

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

export function getFetchDispatcher(ignoreHttpsErrors: boolean): Agent | undefined {
  if (!ignoreHttpsErrors) {
    return undefined;
  }
  return getInsecureAgent();
}

/** The slice of a fetch Response the engine reads. Both undici and global Responses satisfy it. */
export interface HttpResponse {
  readonly status: number;
  readonly ok: boolean;
  readonly url: string;
  readonly headers: { get(name: string): string | null };
  arrayBuffer(): Promise<ArrayBuffer>;
}

export interface HttpRequestInit {
  method: "GET" | "HEAD" | "POST";
  headers: Record<string, string>;
  body?: string;
  signal: AbortSignal;
  redirect: "follow";
}

export type FetchFn = (url: string, init: HttpRequestInit) => Promise<HttpResponse>;

export function createDefaultFetch(ignoreHttpsErrors: boolean): FetchFn {
  const dispatcher = getFetchDispatcher(ignoreHttpsErrors);
  return (url, init) => undiciFetch(url, { ...init, dispatcher });
}
