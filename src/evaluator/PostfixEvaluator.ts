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

import { isOperator } from "../utils/Operators.js";
import { type Result, err, ok } from "../utils/Result.js";
import { isDecimal, isIdentifier } from "../utils/Strings.js";
import { InvalidTokenError } from "../converter/ConverterError.js";
import { type VariableValues, calcOp, lookupVariable } from "./Arithmetic.js";
import {
    type DivisionByZeroError, InsufficientOperandsError, MalformedExpressionError, UndefinedVariableError,
} from "./EvaluatorError.js";

export type EvaluationError =
    InsufficientOperandsError | DivisionByZeroError | UndefinedVariableError |
    MalformedExpressionError | InvalidTokenError;

/**
 * Evaluate a space separated postfix expression on a value stack.
 * Tokens are, in order of precedence: operators, variables bound in the given values,
 * decimal literals with optional sign. All arithmetic is floating point.
 * The values are only read.
 */
export function evaluatePostfix(postfix: string, variables: VariableValues): Result<number, EvaluationError> {
    const stack: number[] = [];
    const tokens = postfix.split(/\s+/).filter(t => t.length > 0);

    for (const token of tokens) {
        if (isOperator(token)) {
            if (stack.length < 2) {
                return err(new InsufficientOperandsError(token));
            }
            const rhs = stack.pop() ?? 0;
            const lhs = stack.pop() ?? 0;
            const res = calcOp(token, lhs, rhs);
            if (!res.ok) {
                return res;
            }
            stack.push(res.value);
            continue;
        }

        const value = lookupVariable(variables, token);
        if (value !== undefined) {
            stack.push(value);
        } else if (isDecimal(token)) {
            stack.push(Number.parseFloat(token));
        } else if (isIdentifier(token)) {
            return err(new UndefinedVariableError(token));
        } else {
            return err(new InvalidTokenError(token));
        }
    }

    if (stack.length != 1) {
        return err(new MalformedExpressionError(stack.length));
    }

    return ok(stack[0]);
}
