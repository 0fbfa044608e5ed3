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

export type Operator = "+" | "-" | "*" | "/" | "^";
export type Associativity = "left" | "right";

export interface OperatorInfo {
    precedence: number;
    associativity: Associativity;
}

export const OperatorChars: readonly string[] = ["+", "-", "*", "/", "^"];

export const OperatorTable: Readonly<Record<Operator, OperatorInfo>> = {
    "+": { precedence: 1, associativity: "left" },
    "-": { precedence: 1, associativity: "left" },
    "*": { precedence: 2, associativity: "left" },
    "/": { precedence: 2, associativity: "left" },
    "^": { precedence: 3, associativity: "right" },
};

export function isOperator(str: string): str is Operator {
    return OperatorChars.includes(str);
}

/**
 * Whether an operator already on the stack must be emitted before pushing the incoming one.
 * Equal precedence only binds to the left for left-associative operators.
 */
export function bindsBefore(top: Operator, incoming: Operator): boolean {
    const topInfo = OperatorTable[top];
    const inInfo = OperatorTable[incoming];

    if (topInfo.precedence != inInfo.precedence) {
        return topInfo.precedence > inInfo.precedence;
    }
    return inInfo.associativity == "left";
}
