import { Graph } from "../graph.js";
import { ValidationResult } from "../results.js";
import { PropertyShape, ShapePattern } from "../shapes.js";
import { ConstraintComponent, Term } from "../terms.js";
import { buildViolation, getPropertyValues } from "./helpers.js";

function checkPattern(focusNode: Term, shape: PropertyShape, pattern: ShapePattern, values: Term[]): ValidationResult[] {
    const results: ValidationResult[] = [];
    for (const value of values) {
        if (value.termType !== "Literal") {
            results.push(buildViolation(
                focusNode,
                shape,
                `Value is not a literal and cannot match pattern "${pattern.source}"`,
                ConstraintComponent.Pattern,
                [["pattern", pattern.source], ["actualValue", value]]
            ));
        } else if (!pattern.regex.test(value.value)) {
            results.push(buildViolation(
                focusNode,
                shape,
                `Value does not match required pattern "${pattern.source}"`,
                ConstraintComponent.Pattern,
                [["pattern", pattern.source], ["actualValue", value]]
            ));
        }
    }
    return results;
}

const graphemes = new Intl.Segmenter(undefined, { granularity: "grapheme" });

/** user-perceived characters, so combining marks and emoji sequences count once */
function graphemeLength(text: string): number {
    let length = 0;
    for (const _segment of graphemes.segment(text)) {
        length++;
    }
    return length;
}

function checkMinLength(focusNode: Term, shape: PropertyShape, minLength: number, values: Term[]): ValidationResult[] {
    const results: ValidationResult[] = [];
    for (const value of values) {
        if (value.termType !== "Literal") {
            results.push(buildViolation(
                focusNode,
                shape,
                `Value is not a literal (expected at least ${minLength} characters)`,
                ConstraintComponent.MinLength,
                [["minLength", minLength], ["actualValue", value]]
            ));
            continue;
        }
        const length = graphemeLength(value.value);
        if (length < minLength) {
            results.push(buildViolation(
                focusNode,
                shape,
                `Value is too short (expected at least ${minLength} characters, found ${length})`,
                ConstraintComponent.MinLength,
                [["minLength", minLength], ["actualLength", length], ["actualValue", value]]
            ));
        }
    }
    return results;
}

/**
 * Checks `pattern` and `minLength` on the lexical form of each value.
 * Values that are not literals fail both checks.
 */
export function validateString(graph: Graph, focusNode: Term, shape: PropertyShape): ValidationResult[] {
    const { pattern, minLength } = shape;
    if (pattern === undefined && minLength === undefined) {
        return [];
    }

    const values = getPropertyValues(graph, focusNode, shape);
    return [
        ...(pattern !== undefined ? checkPattern(focusNode, shape, pattern, values) : []),
        ...(minLength !== undefined ? checkMinLength(focusNode, shape, minLength, values) : []),
    ];
}
