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

import { tokenToString } from "../lexer/formatToken.js";
import type { Token } from "../lexer/Token.js";
import { CodeError } from "../utils/CodeError.js";

export class UnexpectedTokenError extends CodeError {
    public readonly kind = "UnexpectedTokenError";
    public readonly token: Token;

    public constructor(token: Token) {
        super(`Unexpected token ${tokenToString(token)}`, token.position);
        this.token = token;
    }
}

export class UnexpectedEndOfInputError extends CodeError {
    public readonly kind = "UnexpectedEndOfInputError";

    public constructor(position: number) {
        super("Unexpected end of input", position);
    }
}

export class MissingClosingParenError extends CodeError {
    public readonly kind = "MissingClosingParenError";

    // position of the unterminated '('
    public constructor(position: number) {
        super("Missing closing parenthesis", position);
    }
}

export class TrailingTokensError extends CodeError {
    public readonly kind = "TrailingTokensError";
    public readonly tokens: readonly Token[];

    public constructor(tokens: readonly Token[]) {
        super(`Unexpected tokens at end of expression: ${tokens.map(t => tokenToString(t)).join(", ")}`, tokens[0]?.position);
        this.tokens = tokens;
    }
}

export class InvalidAssignmentTargetError extends CodeError {
    public readonly kind = "InvalidAssignmentTargetError";

    public constructor(position: number) {
        super("Assignment target must be an identifier", position);
    }
}
