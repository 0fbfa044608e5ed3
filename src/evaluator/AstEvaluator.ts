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

import type * as Nodes from "../parser/nodes/Node.js";
import { NodeType } from "../parser/nodes/Node.js";
import { type Result, err, ok } from "../utils/Result.js";
import { type VariableValues, calcOp, lookupVariable } from "./Arithmetic.js";
import { type DivisionByZeroError, UndefinedVariableError } from "./EvaluatorError.js";

export type AstEvaluationError = DivisionByZeroError | UndefinedVariableError;

/**
 * Interpret a tree directly, with the same arithmetic as the postfix evaluator.
 * An assignment evaluates to the value assigned, the bindings are not changed.
 */
export function evaluateAst(node: Nodes.Node, variables: VariableValues): Result<number, AstEvaluationError> {
    switch (node.type) {
        case NodeType.Number:
            return ok(node.value);
        case NodeType.Identifier: {
            const value = lookupVariable(variables, node.name);
            return value === undefined ? err(new UndefinedVariableError(node.name)) : ok(value);
        }
        case NodeType.BinaryOp: {
            const lhs = evaluateAst(node.left, variables);
            if (!lhs.ok) {
                return lhs;
            }
            const rhs = evaluateAst(node.right, variables);
            if (!rhs.ok) {
                return rhs;
            }
            return calcOp(node.operator, lhs.value, rhs.value);
        }
        case NodeType.UnaryOp: {
            const operand = evaluateAst(node.operand, variables);
            if (!operand.ok) {
                return operand;
            }
            return ok(node.operator == "-" ? -operand.value : operand.value);
        }
        case NodeType.Assignment:
            return evaluateAst(node.value, variables);
    }
}
