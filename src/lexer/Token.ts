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

export type Token =
    NumberToken | IdentifierToken | OperatorToken |
    LParenToken | RParenToken | AssignToken;

export enum TokenType {
    Number, Identifier, Operator,
    LParen, RParen, Assign,
}

export interface BaseToken {
    readonly type: TokenType;
    readonly text: string;

    // 0-based offset of the first character in the input
    readonly position: number;
}

export interface NumberToken extends BaseToken {
    readonly type: TokenType.Number;
}

export interface IdentifierToken extends BaseToken {
    readonly type: TokenType.Identifier;
}

export interface OperatorToken extends BaseToken {
    readonly type: TokenType.Operator;
    readonly text: Operator;
}

export interface LParenToken extends BaseToken {
    readonly type: TokenType.LParen;
    readonly text: "(";
}

export interface RParenToken extends BaseToken {
    readonly type: TokenType.RParen;
    readonly text: ")";
}

export interface AssignToken extends BaseToken {
    readonly type: TokenType.Assign;
    readonly text: "=";
}

// tokens are equal by type and text, the position is informational
export function tokensEqual(a: Token, b: Token): boolean {
    return a.type == b.type && a.text == b.text;
}
