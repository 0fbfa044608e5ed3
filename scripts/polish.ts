#!/usr/bin/env node
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

import { array, command, extendType, flag, multioption, positional, run, string } from "cmd-ts";
import { analyze, evaluateAnalysis, substituteVariables, type Analysis } from "../src/Notation.js";
import { parse } from "../src/parser/Parser.js";
import { dumpAst } from "../src/parser/nodes/dumpAst.js";
import { CodeError, formatCodeError } from "../src/utils/CodeError.js";
import { unwrap } from "../src/utils/Result.js";

const Binding = extendType(string, {
    displayName: "NAME=VALUE",
    description: "Value of a variable",
    async from(str) {
        const match = str.match(/^([A-Za-z_][A-Za-z0-9_]*)=(.+)$/);
        if (!match) {
            throw new Error(`Expected NAME=VALUE, got '${str}'`);
        }
        const value = Number(match[2]);
        if (Number.isNaN(value)) {
            throw new Error(`Invalid number for ${match[1]}: '${match[2]}'`);
        }
        return { name: match[1], value };
    },
});

function formatTable(headers: string[], rows: string[][]): string[] {
    const widths = headers.map((h, i) => Math.max(h.length, ...rows.map(r => r[i].length)));
    const fmtRow = (row: string[]) => row.map((cell, i) => cell.padEnd(widths[i])).join(" | ");

    return [
        fmtRow(headers),
        widths.map(w => "".padEnd(w, "-")).join("-+-"),
        ...rows.map(fmtRow),
    ];
}

function printAnalysis(analysis: Analysis) {
    console.log(`Variables:  ${analysis.variables.length > 0 ? analysis.variables.join(", ") : "(none)"}`);
    console.log(`Postfix:    ${analysis.postfix}`);
    console.log(`Prefix:     ${analysis.prefix}`);

    console.log("\nTriples");
    const triples = analysis.triples.map((t, i) => [`(${i + 1})`, t.operator, t.arg1, t.arg2]);
    formatTable(["Ref", "Op", "Arg 1", "Arg 2"], triples).forEach(line => console.log(line));

    console.log("\nQuadruples");
    const quads = analysis.quadruples.map(q => [q.operator, q.arg1, q.arg2, q.result]);
    formatTable(["Op", "Arg 1", "Arg 2", "Result"], quads).forEach(line => console.log(line));
}

const cmd = command({
    name: "polish",
    description: "Convert infix expressions to polish notation and three-address code",
    args: {
        bindings: multioption({
            long: "var",
            short: "v",
            description: "Bind a variable, e.g. --var A=1.5",
            type: array(Binding),
        }),
        outputAst: flag({
            long: "ast",
            short: "a",
            description: "Print the abstract syntax tree",
        }),
        expression: positional({
            displayName: "expression",
            description: "Infix expression, e.g. \"(A + B) * C\"",
            type: string,
        }),
    },

    handler: (args) => {
        const expression = args.expression;
        try {
            if (args.outputAst) {
                dumpAst(unwrap(parse(expression)), line => console.log(line));
                console.log();
            }

            const analysis = unwrap(analyze(expression));
            printAnalysis(analysis);

            const values: Record<string, number> = {};
            args.bindings.forEach(b => values[b.name] = b.value);

            const missing = analysis.variables.filter(v => !Object.hasOwn(values, v));
            if (missing.length > 0) {
                console.log(`\nNot evaluated, no value for: ${missing.join(", ")}`);
                return;
            }

            const result = unwrap(evaluateAnalysis(analysis, values));
            const bound = `[${substituteVariables(analysis.postfix, values)}]`;
            const shown = analysis.target ? `${analysis.target} = ${bound}` : bound;
            console.log(`\n${shown} = ${result}`);
        } catch (e) {
            if (e instanceof CodeError) {
                console.error(formatCodeError(e, expression));
                process.exit(-1);
            }
            throw e;
        }
    },
});

void run(cmd, process.argv.slice(2));
