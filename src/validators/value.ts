import { Graph } from "../graph.js";
import { ValidationResult } from "../results.js";
import { PropertyShape } from "../shapes.js";
import { ConstraintComponent, containsTerm, Term, toSparqlTerm } from "../terms.js";
import { buildViolation, getPropertyValues, parseNumericLexical } from "./helpers.js";

function checkIn(focusNode: Term, shape: PropertyShape, values: Term[]): ValidationResult[] {
    if (shape.inList.length === 0) {
        return [];
    }
    return values
        .filter((value) => !containsTerm(shape.inList, value))
        .map((value) => buildViolation(
            focusNode,
            shape,
            "Value is not one of the allowed values",
            ConstraintComponent.In,
            [["allowedValues", shape.inList], ["actualValue", value]]
        ));
}

function checkHasValue(focusNode: Term, shape: PropertyShape, required: Term, values: Term[]): ValidationResult[] {
    if (containsTerm(values, required)) {
        return [];
    }
    return [buildViolation(
        focusNode,
        shape,
        `Required value ${toSparqlTerm(required)} is missing`,
        ConstraintComponent.HasValue,
        [["requiredValue", required]]
    )];
}

function checkMaxInclusive(focusNode: Term, shape: PropertyShape, max: number, values: Term[]): ValidationResult[] {
    const results: ValidationResult[] = [];
    for (const value of values) {
        const num = value.termType === "Literal" ? parseNumericLexical(value.value) : undefined;
        if (num === undefined) {
            results.push(buildViolation(
                focusNode,
                shape,
                `Value is not numeric (expected <= ${max})`,
                ConstraintComponent.MaxInclusive,
                [["maxInclusive", max], ["actualValue", value]]
            ));
        } else if (num > max) {
            results.push(buildViolation(
                focusNode,
                shape,
                `Value exceeds maximum (expected <= ${max}, found ${value.value})`,
                ConstraintComponent.MaxInclusive,
                [["maxInclusive", max], ["actualValue", value]]
            ));
        }
    }
    return results;
}

/**
 * Checks `inList`, `hasValue` and `maxInclusive`, in that order.
 * `hasValue` is satisfied by a single matching value and so yields at most
 * one result; the other two report each offending value.
 */
export function validateValue(graph: Graph, focusNode: Term, shape: PropertyShape): ValidationResult[] {
    const { hasValue, maxInclusive } = shape;
    if (shape.inList.length === 0 && hasValue === undefined && maxInclusive === undefined) {
        return [];
    }

    const values = getPropertyValues(graph, focusNode, shape);
    return [
        ...checkIn(focusNode, shape, values),
        ...(hasValue !== undefined ? checkHasValue(focusNode, shape, hasValue, values) : []),
        ...(maxInclusive !== undefined ? checkMaxInclusive(focusNode, shape, maxInclusive, values) : []),
    ];
}
