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

import { CodeError } from "../utils/CodeError.js";
import { replaceNonPrints } from "../utils/Strings.js";

export class EmptyInputError extends CodeError {
    public readonly kind = "EmptyInputError";

    public constructor() {
        super("Expression must not be empty");
    }
}

export class LexError extends CodeError {
    public readonly kind = "LexError";
    public readonly text: string;

    public constructor(text: string, position: number) {
        super(`Unrecognized character '${replaceNonPrints(text)}' at position ${position}`, position);
        this.text = text;
    }
}
