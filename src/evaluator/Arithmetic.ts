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
import { type Result, err, ok } from "../utils/Result.js";
import { DivisionByZeroError } from "./EvaluatorError.js";

export type VariableValues = Readonly<Record<string, number>>;

export function calcOp(operator: Operator, lhs: number, rhs: number): Result<number, DivisionByZeroError> {
    switch (operator) {
        case "+":   return ok(lhs + rhs);
        case "-":   return ok(lhs - rhs);
        case "*":   return ok(lhs * rhs);
        case "/":   return rhs == 0 ? err(new DivisionByZeroError()) : ok(lhs / rhs);
        case "^":   return ok(lhs ** rhs);
    }
}

export function lookupVariable(variables: VariableValues, name: string): number | undefined {
    return Object.hasOwn(variables, name) ? variables[name] : undefined;
}
