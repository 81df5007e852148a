export function jsonResponse(body: unknown, status = 200, headers: Record<string, string> = {}): Response {
    return new Response(JSON.stringify(body), {
        status,
        headers: { "Content-Type": "application/json", ...headers },
    });
}

export type RecordedRequest = { url: string; init?: RequestInit };

/**
 * fetch stand-in that answers from a queue (or a router function) and records
 * every request.
 */
export function fakeFetch(respond: Response[] | ((url: string, init?: RequestInit) => Response | Promise<Response>)) {
    const requests: RecordedRequest[] = [];
    const queue = Array.isArray(respond) ? [...respond] : [];
    const route = Array.isArray(respond) ? undefined : respond;

    const fetchImpl: typeof fetch = async (input, init) => {
        const url = typeof input === "string" ? input : input instanceof URL ? input.toString() : input.url;
        requests.push({ url, init });
        if (route) return route(url, init);

        const next = queue.shift();
        if (!next) throw new Error(`unexpected request: ${url}`);
        return next;
    };

    return { fetchImpl, requests };
}
