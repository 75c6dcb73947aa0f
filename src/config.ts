import fs from "node:fs";
import * as yaml from "js-yaml";
import { z } from "zod";
import { MAX_TIMER_DELAY_MS, RunOptions } from "./engine.js";
import { DatasetQueryExecutor } from "./datasetQueryExecutor.js";
import { ConfigurationError, errorMessage } from "./errors.js";
import { QueryExecutor, SparqlEndpointExecutor } from "./queryExecutor.js";

const DEFAULT_CONFIG_PATH = "config/config.yaml";

const ConfigSchema = z.object({
    validation: z.object({
        parallel: z.boolean().default(false),
        max_concurrency: z.number().int().positive().optional(),
        timeout_ms: z.number().positive().max(MAX_TIMER_DELAY_MS).optional(),
    }).default({}),
    sparql: z.object({
        endpoint: z.string(),
        auth: z.object({
            username: z.string(),
            password: z.string(),
        }).optional(),
        token: z.string().optional(),
    }).optional(),
});

export type Config = z.infer<typeof ConfigSchema>;

export function parseConfig(text: string): Config {
    let raw: unknown;
    try {
        raw = yaml.load(text);
    } catch (err) {
        throw new ConfigurationError(`Configuration is not valid YAML: ${errorMessage(err)}`);
    }

    const result = ConfigSchema.safeParse(raw ?? {});
    if (!result.success) {
        const issues = result.error.issues.map((e: z.ZodIssue) => {
            const path = e.path.length > 0 ? ` at ${e.path.join(".")}` : "";
            return `${e.message}${path}`;
        });
        throw new ConfigurationError(`Invalid configuration: ${issues.join(", ")}`);
    }
    return result.data;
}

export function loadConfig(filePath: string = DEFAULT_CONFIG_PATH): Config {
    let content: string;
    try {
        content = fs.readFileSync(filePath, "utf-8");
    } catch (err) {
        throw new ConfigurationError(`Failed to read configuration from ${filePath}: ${errorMessage(err)}`);
    }
    return parseConfig(content);
}

/**
 * The SPARQL endpoint executor described by `sparql`; without that section,
 * rule queries run in process against the data graph.
 */
export function createQueryExecutor(config: Config, fetchImpl?: typeof fetch): QueryExecutor {
    if (!config.sparql) {
        return new DatasetQueryExecutor();
    }
    return new SparqlEndpointExecutor({
        endpoint: config.sparql.endpoint,
        auth: config.sparql.auth,
        token: config.sparql.token,
        fetch: fetchImpl,
    });
}

export function runOptionsFromConfig(config: Config, queryExecutor?: QueryExecutor): RunOptions {
    return {
        parallel: config.validation.parallel,
        maxConcurrency: config.validation.max_concurrency,
        timeoutMs: config.validation.timeout_ms,
        queryExecutor: queryExecutor ?? createQueryExecutor(config),
    };
}
