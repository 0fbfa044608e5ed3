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

import { tokenize } from "../lexer/Lexer.js";
import type { EmptyInputError, LexError } from "../lexer/LexerError.js";
import { type Operator, bindsBefore, isOperator } from "../utils/Operators.js";
import { type Result, andThen, err, ok } from "../utils/Result.js";
import { isDecimal, isIdentifier } from "../utils/Strings.js";
import { InvalidTokenError, UnbalancedParenError } from "./ConverterError.js";

export type ShuntingYardError = UnbalancedParenError | InvalidTokenError;

// number with optional sign or identifier
export function isOperand(token: string): boolean {
    return isDecimal(token) || isIdentifier(token);
}

/**
 * Convert infix token texts to a space separated postfix string using the shunting-yard algorithm.
 * Parentheses only steer the grouping and never appear in the output.
 */
export function infixToPostfix(tokens: readonly string[]): Result<string, ShuntingYardError> {
    const output: string[] = [];
    const stack: (Operator | "(")[] = [];

    for (const token of tokens) {
        if (isOperand(token)) {
            output.push(token);
        } else if (isOperator(token)) {
            while (stack.length > 0) {
                const top = stack[stack.length - 1];
                if (top == "(" || !bindsBefore(top, token)) {
                    break;
                }
                output.push(top);
                stack.pop();
            }
            stack.push(token);
        } else if (token == "(") {
            stack.push("(");
        } else if (token == ")") {
            while (true) {
                const top = stack.pop();
                if (top === undefined) {
                    return err(new UnbalancedParenError(")"));
                } else if (top == "(") {
                    break;
                }
                output.push(top);
            }
        } else {
            return err(new InvalidTokenError(token));
        }
    }

    if (stack.includes("(")) {
        return err(new UnbalancedParenError("("));
    }

    return ok(output.concat(stack.reverse()).join(" "));
}

export function convertToPostfix(expression: string): Result<string, EmptyInputError | LexError | ShuntingYardError> {
    return andThen(tokenize(expression), tokens => infixToPostfix(tokens.map(t => t.text)));
}
