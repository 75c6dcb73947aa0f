export { run, selectFocusNodes, validatePropertyShape, PROPERTY_VALIDATORS } from "./engine.js";
export type { RunOptions } from "./engine.js";
export { ConfigurationError, QueryError, ShapeDefinitionError, UnitTimeoutError } from "./errors.js";
export { DatasetGraph, graphFromTurtle, loadTurtleFile, parseTurtle } from "./graph.js";
export type { Graph } from "./graph.js";
export { DatasetQueryExecutor } from "./datasetQueryExecutor.js";
export { parseSparqlResults, SparqlEndpointExecutor } from "./queryExecutor.js";
export type { BindingRow, QueryExecutor, SparqlEndpointOptions } from "./queryExecutor.js";
export { Severity, ValidationReport } from "./results.js";
export type { DetailValue, ReportStatus, ResultDetails, ValidationResult } from "./results.js";
export { compilePattern, defineNodeShape, definePropertyShape, defineRuleConstraint } from "./shapes.js";
export type {
    NodeShape,
    NodeShapeInput,
    PropertyShape,
    PropertyShapeInput,
    RuleConstraint,
    RuleConstraintInput,
    ShapePattern,
} from "./shapes.js";
export {
    blankNode,
    ConstraintComponent,
    isTerm,
    literal,
    namedNode,
    RDF,
    RDF_TYPE,
    SH,
    termEquals,
    toSparqlTerm,
    uniqueTerms,
    XSD,
} from "./terms.js";
export type { ShapeId, Term } from "./terms.js";
export { validateCardinality } from "./validators/cardinality.js";
export { validateQualified } from "./validators/qualified.js";
export { bindQuery, validateRules } from "./validators/rule.js";
export { validateString } from "./validators/string.js";
export { validateType } from "./validators/type.js";
export { validateValue } from "./validators/value.js";
export { createQueryExecutor, loadConfig, parseConfig, runOptionsFromConfig } from "./config.js";
export type { Config } from "./config.js";
