import type { NamedNode } from "@rdfjs/types";
import { z } from "zod";
import { errorMessage, ShapeDefinitionError } from "./errors.js";
import { blankNode, isNamedNode, isTerm, ShapeId, Term } from "./terms.js";

/**
 * A pattern compiled once, when the shape is defined. `regex` only matches
 * the whole lexical form.
 */
export interface ShapePattern {
    readonly source: string;
    readonly flags: string;
    readonly regex: RegExp;
}

/**
 * Constraints on the values reachable from a focus node through `path`.
 * Every optional constraint that is absent is simply not checked.
 */
export interface PropertyShape {
    readonly id: ShapeId;
    readonly path: NamedNode;
    readonly minCount?: number;
    readonly maxCount?: number;
    readonly datatype?: NamedNode;
    readonly class?: NamedNode;
    readonly pattern?: ShapePattern;
    readonly minLength?: number;
    /** allowed values; empty means no enumeration constraint */
    readonly inList: readonly Term[];
    readonly hasValue?: Term;
    readonly maxInclusive?: number;
    readonly qualifiedClass?: NamedNode;
    readonly qualifiedMinCount?: number;
    /** replaces the default message of every result produced for this shape */
    readonly message?: string;
}

/**
 * A query-based constraint evaluated once per focus node. Every `$this` in
 * the template is replaced by the focus node; each row the query returns is
 * one violation.
 */
export interface RuleConstraint {
    readonly sourceShapeId: ShapeId;
    readonly queryTemplate: string;
    readonly message?: string;
    readonly prefixes?: Readonly<Record<string, string>>;
}

export interface NodeShape {
    readonly id: ShapeId;
    readonly targetClasses: readonly NamedNode[];
    readonly propertyShapes: readonly PropertyShape[];
    readonly ruleConstraints: readonly RuleConstraint[];
}

const ALLOWED_FLAGS = /^[ims]*$/;

const NamedNodeSchema = z.custom<NamedNode>(isNamedNode, { message: "Expected an IRI" });

const TermSchema = z.custom<Term>(isTerm, { message: "Expected an RDF term" });

const ShapeIdSchema = z.custom<ShapeId>(
    (value) => isTerm(value) && value.termType !== "Literal",
    { message: "Shape id must be an IRI or a blank node" }
);

const CountSchema = z.number().int({ message: "Must be an integer" }).nonnegative({ message: "Must not be negative" });

const PropertyShapeInputSchema = z.object({
    id: ShapeIdSchema.optional(),
    path: NamedNodeSchema,
    minCount: CountSchema.optional(),
    maxCount: CountSchema.optional(),
    datatype: NamedNodeSchema.optional(),
    class: NamedNodeSchema.optional(),
    pattern: z.string().optional(),
    flags: z.string().regex(ALLOWED_FLAGS, { message: "Only the flags i, m and s are supported" }).optional(),
    minLength: CountSchema.optional(),
    inList: z.array(TermSchema).default([]),
    hasValue: TermSchema.optional(),
    maxInclusive: z.number().finite({ message: "Must be a finite number" }).optional(),
    qualifiedClass: NamedNodeSchema.optional(),
    qualifiedMinCount: CountSchema.optional(),
    message: z.string().optional(),
}).superRefine((shape, ctx) => {
    if (shape.minCount !== undefined && shape.maxCount !== undefined && shape.minCount > shape.maxCount) {
        ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `minCount (${shape.minCount}) must not exceed maxCount (${shape.maxCount})`,
            path: ["minCount"],
        });
    }
    if (shape.flags !== undefined && shape.pattern === undefined) {
        ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: "flags are only allowed together with a pattern",
            path: ["flags"],
        });
    }
});

const PrefixesSchema = z.record(
    z.string().regex(/^([A-Za-z][\w.-]*)?$/, { message: "Invalid prefix name" }),
    z.string().url({ message: "Prefix must map to an absolute IRI" })
);

const RuleConstraintInputSchema = z.object({
    sourceShapeId: ShapeIdSchema,
    queryTemplate: z.string().refine((query) => query.includes("$this"), {
        message: "Query template must contain at least one $this placeholder",
    }),
    message: z.string().optional(),
    prefixes: PrefixesSchema.optional(),
});

const NodeShapeInputSchema = z.object({
    id: ShapeIdSchema.optional(),
    targetClasses: z.array(NamedNodeSchema).default([]),
    propertyShapes: z.array(
        z.custom<PropertyShape>(
            (value) => typeof value === "object" && value !== null && "path" in value && isNamedNode(value.path),
            { message: "Expected a property shape built with definePropertyShape" }
        )
    ).default([]),
    ruleConstraints: z.array(RuleConstraintInputSchema.omit({ sourceShapeId: true })).default([]),
});

export type PropertyShapeInput = z.input<typeof PropertyShapeInputSchema>;
export type RuleConstraintInput = z.input<typeof RuleConstraintInputSchema>;
export type NodeShapeInput = z.input<typeof NodeShapeInputSchema>;

function parseOrThrow<S extends z.ZodTypeAny>(schema: S, input: unknown, what: string): z.output<S> {
    const result = schema.safeParse(input);
    if (!result.success) {
        const issues = result.error.issues.map((e: z.ZodIssue) => {
            const path = e.path.length > 0 ? ` at ${e.path.join(".")}` : "";
            return `${e.message}${path}`;
        });
        throw new ShapeDefinitionError(`Invalid ${what}: ${issues.join(", ")}`);
    }
    return result.data;
}

/**
 * XML Schema patterns may escape `-` anywhere; unicode-mode RegExp only
 * accepts `\-` inside a character class.
 */
function normalizeEscapes(source: string): string {
    let out = "";
    let inClass = false;
    for (let i = 0; i < source.length; i++) {
        const char = source[i];
        if (char === "\\" && i + 1 < source.length) {
            const next = source[i + 1];
            out += !inClass && next === "-" ? "-" : char + next;
            i++;
            continue;
        }
        if (char === "[" && !inClass) {
            inClass = true;
        } else if (char === "]" && inClass) {
            inClass = false;
        }
        out += char;
    }
    return out;
}

/**
 * Compiles a pattern for full matching. The expression is wrapped in
 * start/end-of-input assertions that hold regardless of the `m` flag, and
 * is always compiled in unicode mode.
 */
export function compilePattern(source: string, flags: string = ""): ShapePattern {
    if (!ALLOWED_FLAGS.test(flags)) {
        throw new ShapeDefinitionError(`Unsupported pattern flags "${flags}"`);
    }
    let regex: RegExp;
    try {
        regex = new RegExp(`(?<![\\s\\S])(?:${normalizeEscapes(source)})(?![\\s\\S])`, `${flags}u`);
    } catch (err) {
        throw new ShapeDefinitionError(`Invalid pattern "${source}": ${errorMessage(err)}`);
    }
    return Object.freeze({ source, flags, regex });
}

export function definePropertyShape(input: PropertyShapeInput): PropertyShape {
    const { id, pattern, flags, inList, ...constraints } = parseOrThrow(PropertyShapeInputSchema, input, "property shape");
    return Object.freeze({
        ...constraints,
        id: id ?? blankNode(),
        pattern: pattern === undefined ? undefined : compilePattern(pattern, flags),
        inList: Object.freeze([...inList]),
    });
}

export function defineRuleConstraint(input: RuleConstraintInput): RuleConstraint {
    const { prefixes, ...rule } = parseOrThrow(RuleConstraintInputSchema, input, "rule constraint");
    return Object.freeze({
        ...rule,
        prefixes: prefixes === undefined ? undefined : Object.freeze({ ...prefixes }),
    });
}

/**
 * Builds a node shape. Rule constraints are given without a source shape
 * and are attached to this shape's id.
 */
export function defineNodeShape(input: NodeShapeInput): NodeShape {
    const parsed = parseOrThrow(NodeShapeInputSchema, input, "node shape");
    const id = parsed.id ?? blankNode();
    return Object.freeze({
        id,
        targetClasses: Object.freeze([...parsed.targetClasses]),
        propertyShapes: Object.freeze([...parsed.propertyShapes]),
        ruleConstraints: Object.freeze(
            parsed.ruleConstraints.map((rule) => defineRuleConstraint({ ...rule, sourceShapeId: id }))
        ),
    });
}
