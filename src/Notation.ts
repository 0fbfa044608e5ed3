/*
 *   Yamas - Yet Another Macro Assembler (for the PDP-8)
 *   Copyright (C) 2023 Folke Will <folko@solhost.org>
 *
 *   This program is free software: you can redistribute it and/or modify
 *   it under the terms of the GNU Affero General Public License as published by
 *   the Free Software Foundation, either version 3 of the License, or
 *   (at your option) any later version.
 *
 *   This program is distributed in the hope that it will be useful,
 *   but WITHOUT ANY WARRANTY; without even the implied warranty of
 *   MERCHANTABILITY or FITNESS FOR A PARTICULAR PURPOSE.  See the
 *   GNU Affero General Public License for more details.
 *
 *   You should have received a copy of the GNU Affero General Public License
 *   along with this program.  If not, see <https://www.gnu.org/licenses/>.
 */

import { astToPostfix, astToPrefix } from "./converter/Polish.js";
import { type ShuntingYardError, convertToPostfix } from "./converter/ShuntingYard.js";
import { type Quadruple, type Triple, astToQuadruples, astToTriples } from "./converter/ThreeAddressCode.js";
import type { UnsupportedNodeError } from "./converter/ConverterError.js";
import { type VariableValues, lookupVariable } from "./evaluator/Arithmetic.js";
import { MissingVariablesError } from "./evaluator/EvaluatorError.js";
import { type EvaluationError, evaluatePostfix } from "./evaluator/PostfixEvaluator.js";
import { tokenize } from "./lexer/Lexer.js";
import type { EmptyInputError, LexError } from "./lexer/LexerError.js";
import { TokenType } from "./lexer/Token.js";
import { type ParserError, parse } from "./parser/Parser.js";
import type * as Nodes from "./parser/nodes/Node.js";
import { NodeType } from "./parser/nodes/Node.js";
import { isOperator } from "./utils/Operators.js";
import { type Result, andThen, err, ok } from "./utils/Result.js";

export type VariablesResult = Result<readonly string[], EmptyInputError | LexError>;

export type ExpressionError =
    EmptyInputError | LexError | MissingVariablesError |
    ShuntingYardError | EvaluationError;

export type AnalysisError = LexError | ParserError | ShuntingYardError | UnsupportedNodeError;

/**
 * Everything a front end shows for one expression.
 * For an assignment X = e, target is X and all conversions are done on e.
 */
export interface Analysis {
    expression: string;
    target?: string;
    variables: readonly string[];
    postfix: string;
    prefix: string;
    triples: Triple[];
    quadruples: Quadruple[];
}

const VariableCacheSize = 256;
const variableCache = new Map<string, VariablesResult>();

/**
 * Names of all identifiers in an expression, sorted and without duplicates.
 */
export function extractVariables(expression: string): VariablesResult {
    const cached = variableCache.get(expression);
    if (cached) {
        return cached;
    }

    const tokens = tokenize(expression);
    if (!tokens.ok) {
        return tokens;
    }

    const names = tokens.value
        .filter(t => t.type == TokenType.Identifier)
        .map(t => t.text);
    const res: VariablesResult = Object.freeze(ok(Object.freeze(sortUnique(names))));

    if (variableCache.size >= VariableCacheSize) {
        // Map iterates in insertion order, so the first key is the oldest
        const oldest = variableCache.keys().next();
        if (!oldest.done) {
            variableCache.delete(oldest.value);
        }
    }
    variableCache.set(expression, res);

    return res;
}

/**
 * Evaluate an infix expression. Every variable must be bound: all missing names are
 * reported together before any conversion happens.
 */
export function evaluateExpression(expression: string, variables: VariableValues): Result<number, ExpressionError> {
    const required = extractVariables(expression);
    if (!required.ok) {
        return required;
    }

    const missing = findMissing(required.value, variables);
    if (missing) {
        return err(missing);
    }

    return andThen(convertToPostfix(expression), postfix => evaluatePostfix(postfix, variables));
}

export function analyze(expression: string): Result<Analysis, AnalysisError> {
    const ast = parse(expression);
    if (!ast.ok) {
        return ast;
    }

    let target: string | undefined;
    let valueNode: Nodes.Node = ast.value;
    let postfix: Result<string, AnalysisError>;
    let variables: readonly string[];

    if (ast.value.type == NodeType.Assignment) {
        target = ast.value.target.name;
        valueNode = ast.value.value;
        postfix = astToPostfix(valueNode);
        variables = collectIdentifiers(valueNode);
    } else {
        postfix = convertToPostfix(expression);
        const extracted = extractVariables(expression);
        if (!extracted.ok) {
            return extracted;
        }
        variables = extracted.value;
    }

    if (!postfix.ok) {
        return postfix;
    }

    const prefix = astToPrefix(valueNode);
    if (!prefix.ok) {
        return prefix;
    }

    const triples = astToTriples(valueNode);
    if (!triples.ok) {
        return triples;
    }

    const quadruples = astToQuadruples(valueNode);
    if (!quadruples.ok) {
        return quadruples;
    }

    return ok({
        expression,
        target,
        variables,
        postfix: postfix.value,
        prefix: prefix.value,
        triples: triples.value,
        quadruples: quadruples.value,
    });
}

/**
 * Replace every postfix token that names a bound variable by its value.
 * Tokens are matched whole, so a binding for A leaves AB alone.
 */
export function substituteVariables(postfix: string, variables: VariableValues): string {
    return postfix
        .split(/\s+/)
        .filter(t => t.length > 0)
        .map(token => {
            const value = isOperator(token) ? undefined : lookupVariable(variables, token);
            return value === undefined ? token : value.toString();
        })
        .join(" ");
}

export function evaluateAnalysis(
    analysis: Analysis,
    variables: VariableValues,
): Result<number, MissingVariablesError | EvaluationError> {
    const missing = findMissing(analysis.variables, variables);
    if (missing) {
        return err(missing);
    }
    return evaluatePostfix(analysis.postfix, variables);
}

function findMissing(required: readonly string[], variables: VariableValues): MissingVariablesError | undefined {
    const missing = required.filter(name => lookupVariable(variables, name) === undefined);
    return missing.length > 0 ? new MissingVariablesError(missing) : undefined;
}

function collectIdentifiers(root: Nodes.Node): string[] {
    const names: string[] = [];

    const visit = (node: Nodes.Node) => {
        switch (node.type) {
            case NodeType.Number:
                break;
            case NodeType.Identifier:
                names.push(node.name);
                break;
            case NodeType.BinaryOp:
                visit(node.left);
                visit(node.right);
                break;
            case NodeType.UnaryOp:
                visit(node.operand);
                break;
            case NodeType.Assignment:
                visit(node.target);
                visit(node.value);
                break;
        }
    };

    visit(root);
    return sortUnique(names);
}

function sortUnique(names: string[]): string[] {
    return [...new Set(names)].sort();
}
