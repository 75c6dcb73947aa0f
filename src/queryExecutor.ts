import { z } from "zod";
import { ConfigurationError, errorMessage, QueryError } from "./errors.js";
import { Graph } from "./graph.js";
import { blankNode, literal, namedNode, Term } from "./terms.js";

/**
 * One solution of a query: variable name (without `?`) to bound term.
 * Unbound variables are left out.
 */
export type BindingRow = ReadonlyMap<string, Term>;

/**
 * Runs SELECT queries for rule constraints. Implementations reject with
 * `QueryError` when a query cannot be executed; they must not turn a
 * failure into an empty result.
 */
export interface QueryExecutor {
    execute(graph: Graph, query: string, signal?: AbortSignal): Promise<BindingRow[]>;
}

export interface SparqlEndpointOptions {
    endpoint: string;
    auth?: {
        username: string;
        password: string;
    };
    // bearer token, sent instead of basic auth when both are set
    token?: string;
    fetch?: typeof fetch;
}

const SparqlBindingSchema = z.union([
    z.object({ type: z.literal("uri"), value: z.string() }),
    z.object({ type: z.literal("bnode"), value: z.string() }),
    z.object({
        type: z.enum(["literal", "typed-literal"]),
        value: z.string(),
        "xml:lang": z.string().optional(),
        datatype: z.string().optional(),
    }),
]);

/**
 * application/sparql-results+json, SELECT form
 */
const SparqlResultsSchema = z.object({
    head: z.object({
        vars: z.array(z.string()).default([]),
    }),
    results: z.object({
        bindings: z.array(z.record(z.string(), SparqlBindingSchema)),
    }),
});

type SparqlBinding = z.infer<typeof SparqlBindingSchema>;

const EndpointSchema = z.string().url().refine(
    (val) => val.startsWith("http://") || val.startsWith("https://"),
    { message: "SPARQL endpoint must be an http(s) URL" }
);

function toTerm(binding: SparqlBinding): Term {
    switch (binding.type) {
        case "uri":
            return namedNode(binding.value);
        case "bnode":
            return blankNode(binding.value);
        default: {
            const lang = binding["xml:lang"];
            if (lang) {
                return literal(binding.value, lang);
            }
            return binding.datatype ? literal(binding.value, namedNode(binding.datatype)) : literal(binding.value);
        }
    }
}

/**
 * Converts a SPARQL JSON results document into binding rows. Columns follow
 * `head.vars`; variables that only appear in bindings are appended after.
 */
export function parseSparqlResults(body: unknown): BindingRow[] {
    const parsed = SparqlResultsSchema.safeParse(body);
    if (!parsed.success) {
        throw new QueryError(
            `Unexpected SPARQL results format: ${parsed.error.issues.map((e: z.ZodIssue) => e.message).join(", ")}`
        );
    }
    const { head, results } = parsed.data;

    return results.bindings.map((solution) => {
        const row = new Map<string, Term>();
        for (const name of head.vars) {
            const binding = solution[name];
            if (binding) {
                row.set(name, toTerm(binding));
            }
        }
        for (const [name, binding] of Object.entries(solution)) {
            if (!row.has(name)) {
                row.set(name, toTerm(binding));
            }
        }
        return row;
    });
}

/**
 * Executes rule queries on a SPARQL 1.1 protocol endpoint. The endpoint
 * holds the data, so the graph handed to `execute` is not consulted.
 */
export class SparqlEndpointExecutor implements QueryExecutor {
    private endpoint: string;
    private auth?: { username: string; password: string };
    private token?: string;
    private fetchImpl: typeof fetch;

    constructor(options: SparqlEndpointOptions) {
        const endpoint = EndpointSchema.safeParse(options.endpoint);
        if (!endpoint.success) {
            throw new ConfigurationError(
                `Invalid SPARQL endpoint "${options.endpoint}": ${endpoint.error.issues.map((e: z.ZodIssue) => e.message).join(", ")}`
            );
        }
        this.endpoint = endpoint.data;
        this.auth = options.auth;
        this.token = options.token;
        this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
    }

    async execute(_graph: Graph, query: string, signal?: AbortSignal): Promise<BindingRow[]> {
        const headers: Record<string, string> = {
            "Accept": "application/sparql-results+json",
            "Content-Type": "application/sparql-query",
        };

        if (this.token) {
            headers["Authorization"] = `Bearer ${this.token}`;
        } else if (this.auth?.username && this.auth?.password) {
            const credentials = Buffer.from(`${this.auth.username}:${this.auth.password}`).toString("base64");
            headers["Authorization"] = `Basic ${credentials}`;
        }

        let response: Response;
        try {
            response = await this.fetchImpl(this.endpoint, {
                method: "POST",
                headers,
                body: query,
                signal,
            });
        } catch (err) {
            throw new QueryError(`Failed to reach SPARQL endpoint: ${errorMessage(err)}`, undefined, { cause: err });
        }

        if (!response.ok) {
            throw new QueryError(
                `SPARQL endpoint returned status ${response.status}, Query: ${query}`,
                response.status
            );
        }

        let body: unknown;
        try {
            body = await response.json();
        } catch (err) {
            throw new QueryError(`SPARQL endpoint returned invalid JSON: ${errorMessage(err)}`, response.status, { cause: err });
        }
        return parseSparqlResults(body);
    }
}
