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

import type { Operator } from "../utils/Operators.js";
import { CodeError } from "../utils/CodeError.js";

export class InsufficientOperandsError extends CodeError {
    public readonly kind = "InsufficientOperandsError";
    public readonly operator: Operator;

    public constructor(operator: Operator) {
        super(`Operator '${operator}' requires two operands`);
        this.operator = operator;
    }
}

export class DivisionByZeroError extends CodeError {
    public readonly kind = "DivisionByZeroError";

    public constructor() {
        super("Division by zero");
    }
}

export class UndefinedVariableError extends CodeError {
    public readonly kind = "UndefinedVariableError";
    public readonly variable: string;

    public constructor(variable: string) {
        super(`Variable '${variable}' is not defined`);
        this.variable = variable;
    }
}

export class MalformedExpressionError extends CodeError {
    public readonly kind = "MalformedExpressionError";
    public readonly stackSize: number;

    public constructor(stackSize: number) {
        super(`Malformed postfix expression: ${stackSize} values left on the stack`);
        this.stackSize = stackSize;
    }
}

export class MissingVariablesError extends CodeError {
    public readonly kind = "MissingVariablesError";
    public readonly variables: readonly string[];

    public constructor(variables: readonly string[]) {
        super(`Missing values for variables: ${variables.join(", ")}`);
        this.variables = variables;
    }
}
