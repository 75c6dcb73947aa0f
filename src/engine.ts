import os from "node:os";
import pLimit from "p-limit";
import { z } from "zod";
import { ConfigurationError, errorMessage, QueryError, UnitTimeoutError } from "./errors.js";
import { Graph } from "./graph.js";
import { QueryExecutor } from "./queryExecutor.js";
import { DetailValue, Severity, ValidationReport, ValidationResult } from "./results.js";
import { NodeShape, PropertyShape } from "./shapes.js";
import { RDF_TYPE, Term, toSparqlTerm, uniqueTerms } from "./terms.js";
import { validateCardinality } from "./validators/cardinality.js";
import { PropertyValidator } from "./validators/helpers.js";
import { validateQualified } from "./validators/qualified.js";
import { validateRules } from "./validators/rule.js";
import { validateString } from "./validators/string.js";
import { validateType } from "./validators/type.js";
import { validateValue } from "./validators/value.js";

export interface RunOptions {
    /** run units on a bounded pool instead of one after another (default false) */
    parallel?: boolean;
    /** units in flight at once in parallel mode (default: available parallelism) */
    maxConcurrency?: number;
    /** per-unit time limit in milliseconds, in both modes */
    timeoutMs?: number;
    /** required as soon as any node shape carries rule constraints */
    queryExecutor?: QueryExecutor;
}

/**
 * The fixed order in which every property shape is checked
 */
export const PROPERTY_VALIDATORS: readonly PropertyValidator[] = [
    validateCardinality,
    validateType,
    validateString,
    validateValue,
    validateQualified,
];

/** largest delay setTimeout honours; longer ones fire immediately */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

const RunOptionsSchema = z.object({
    parallel: z.boolean().default(false),
    maxConcurrency: z.number()
        .int({ message: "maxConcurrency must be an integer" })
        .positive({ message: "maxConcurrency must be greater than 0" })
        .optional(),
    timeoutMs: z.number()
        .positive({ message: "timeoutMs must be greater than 0" })
        .finite({ message: "timeoutMs must be finite" })
        .max(MAX_TIMER_DELAY_MS, { message: `timeoutMs must be at most ${MAX_TIMER_DELAY_MS}` })
        .optional(),
    queryExecutor: z.custom<QueryExecutor>(
        (value) => typeof value === "object" && value !== null && "execute" in value && typeof value.execute === "function",
        { message: "queryExecutor must provide an execute() method" }
    ).optional(),
});

interface ResolvedOptions {
    parallel: boolean;
    maxConcurrency: number;
    timeoutMs?: number;
    queryExecutor?: QueryExecutor;
}

/**
 * One (node shape, focus node) pair: the unit of dispatch
 */
interface ValidationUnit {
    shape: NodeShape;
    focusNode: Term;
}

function resolveOptions(options: RunOptions, shapes: readonly NodeShape[]): ResolvedOptions {
    const parsed = RunOptionsSchema.safeParse(options);
    if (!parsed.success) {
        throw new ConfigurationError(
            `Invalid validation options: ${parsed.error.issues.map((e: z.ZodIssue) => e.message).join(", ")}`
        );
    }
    const { parallel, maxConcurrency, timeoutMs, queryExecutor } = parsed.data;

    if (!queryExecutor) {
        const withRules = shapes.find((shape) => shape.ruleConstraints.length > 0);
        if (withRules) {
            throw new ConfigurationError(
                `Shape ${toSparqlTerm(withRules.id)} has rule constraints but no queryExecutor was configured`
            );
        }
    }

    return {
        parallel,
        maxConcurrency: maxConcurrency ?? os.availableParallelism(),
        timeoutMs,
        queryExecutor,
    };
}

/**
 * Focus nodes of a shape: every explicit instance of any of its target
 * classes, once each, in the order they are found.
 */
export function selectFocusNodes(graph: Graph, shape: NodeShape): Term[] {
    return uniqueTerms(shape.targetClasses.flatMap((targetClass) => graph.getSubjects(RDF_TYPE, targetClass)));
}

/**
 * Runs all five core validators over one property shape, in fixed order
 */
export function validatePropertyShape(graph: Graph, focusNode: Term, shape: PropertyShape): ValidationResult[] {
    return PROPERTY_VALIDATORS.flatMap((validate) => validate(graph, focusNode, shape));
}

async function evaluateUnit(
    graph: Graph,
    unit: ValidationUnit,
    queryExecutor: QueryExecutor | undefined,
    signal: AbortSignal
): Promise<ValidationResult[]> {
    const { shape, focusNode } = unit;
    const propertyResults = shape.propertyShapes.flatMap((propertyShape) =>
        validatePropertyShape(graph, focusNode, propertyShape)
    );
    if (shape.ruleConstraints.length === 0 || !queryExecutor) {
        return propertyResults;
    }
    const ruleResults = await validateRules(graph, focusNode, shape.ruleConstraints, queryExecutor, signal);
    return [...propertyResults, ...ruleResults];
}

function engineErrorResult(unit: ValidationUnit, err: unknown): ValidationResult {
    const details: Array<[string, DetailValue]> = [];
    let message: string;

    if (err instanceof UnitTimeoutError) {
        message = `Validation of ${toSparqlTerm(unit.focusNode)} timed out after ${err.timeoutMs}ms`;
        details.push(["errorKind", "UnitTimeout"]);
    } else if (err instanceof QueryError) {
        message = `Rule query failed for ${toSparqlTerm(unit.focusNode)}: ${err.message}`;
        details.push(["errorKind", "QueryError"]);
        if (err.statusCode !== undefined) {
            details.push(["statusCode", err.statusCode]);
        }
    } else {
        message = `Validation of ${toSparqlTerm(unit.focusNode)} failed: ${errorMessage(err)}`;
        details.push(["errorKind", "UnitFailure"]);
    }
    details.push(["error", errorMessage(err)]);

    return {
        focusNode: unit.focusNode,
        sourceShape: unit.shape.id,
        severity: Severity.EngineError,
        message,
        details: new Map(details),
    };
}

/**
 * Evaluates one unit in isolation. Whatever goes wrong (a timeout, a failed
 * query, any other throw) becomes a single EngineError result; the promise
 * itself never rejects.
 */
async function runUnit(graph: Graph, unit: ValidationUnit, options: ResolvedOptions): Promise<ValidationResult[]> {
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;

    try {
        const evaluation = evaluateUnit(graph, unit, options.queryExecutor, controller.signal);
        const timeoutMs = options.timeoutMs;
        if (timeoutMs === undefined) {
            return await evaluation;
        }
        const timeout = new Promise<never>((_, reject) => {
            timer = setTimeout(() => {
                const err = new UnitTimeoutError(timeoutMs);
                controller.abort(err);
                reject(err);
            }, timeoutMs);
        });
        // the abandoned evaluation may still reject once aborted
        void evaluation.catch(() => undefined);
        return await Promise.race([evaluation, timeout]);
    } catch (err) {
        console.warn(`Validation unit failed (shape ${toSparqlTerm(unit.shape.id)}, focus node ${toSparqlTerm(unit.focusNode)}):`, errorMessage(err));
        return [engineErrorResult(unit, err)];
    } finally {
        clearTimeout(timer);
    }
}

/**
 * Validates `dataGraph` against `shapes` and returns the report.
 *
 * Rejects only with `ConfigurationError`, before anything is evaluated.
 * Failures inside a unit show up as EngineError results instead, so a
 * report with `status === "inconclusive"` conforms only as far as it got.
 *
 * Results are ordered by node shape, then focus node, then property shape
 * and validator, with rule results last within a unit. Parallel mode keeps
 * the same order.
 */
export async function run(
    dataGraph: Graph,
    shapes: readonly NodeShape[],
    options: RunOptions = {}
): Promise<ValidationReport> {
    const resolved = resolveOptions(options, shapes);

    const units: ValidationUnit[] = shapes.flatMap((shape) =>
        selectFocusNodes(dataGraph, shape).map((focusNode) => ({ shape, focusNode }))
    );

    let unitResults: ValidationResult[][];
    if (resolved.parallel) {
        const limit = pLimit(resolved.maxConcurrency);
        unitResults = await Promise.all(units.map((unit) => limit(() => runUnit(dataGraph, unit, resolved))));
    } else {
        unitResults = [];
        for (const unit of units) {
            unitResults.push(await runUnit(dataGraph, unit, resolved));
        }
    }

    return new ValidationReport(unitResults.flat());
}
