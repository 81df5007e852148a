import type { z } from "zod";
import { InvalidRequestError } from "../errors";

function parseInput<S extends z.ZodTypeAny>(schema: S, input: unknown, what: string): z.infer<S> {
    const parsed = schema.safeParse(input);
    if (!parsed.success) {
        const issue = parsed.error.issues[0];
        throw new InvalidRequestError(issue ? `${issue.path.join(".")}: ${issue.message}` : `Invalid ${what}`);
    }
    return parsed.data;
}

/** Validates `req.query` against `schema`; the first issue becomes a 400. */
export function parseQuery<S extends z.ZodTypeAny>(schema: S, query: unknown): z.infer<S> {
    return parseInput(schema, query, "query");
}

/** Same for a JSON body. */
export function parseBody<S extends z.ZodTypeAny>(schema: S, body: unknown): z.infer<S> {
    return parseInput(schema, body, "body");
}
