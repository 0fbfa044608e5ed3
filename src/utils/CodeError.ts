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

export abstract class CodeError extends Error {
    public abstract readonly kind: string;

    // 0-based offset into the input expression, if the error can be pinned to one
    public readonly position?: number;

    public constructor(msg: string, position?: number) {
        super(msg);
        this.name = new.target.name;
        this.position = position;
    }
}

export function formatCodeError(error: CodeError, input?: string): string {
    if (error.position === undefined) {
        return error.message;
    }

    let str = `${error.position}: ${error.message}`;
    if (input !== undefined) {
        str += `\n  ${input}\n  ${"".padStart(error.position)}^`;
    }
    return str;
}
