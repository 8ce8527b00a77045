import { z } from "zod";

export type RecalculationTarget =
    | { kind: "all" }
    | { kind: "template"; id: number }
    | { kind: "response"; id: number };

const idArgument = z.coerce.number().int().positive();

/**
 * Usage: recalculate-scores [--template <id> | --response <id>]
 */
export function parseTarget(argv: string[]): RecalculationTarget {
    if (argv.length === 0) {
        return { kind: "all" };
    }

    const [flag, value, ...rest] = argv;
    if (rest.length > 0 || value === undefined) {
        throw new Error("Usage: recalculate-scores [--template <id> | --response <id>]");
    }

    switch (flag) {
        case "--template":
            return { kind: "template", id: idArgument.parse(value) };
        case "--response":
            return { kind: "response", id: idArgument.parse(value) };
        default:
            throw new Error(`Unknown option ${flag}`);
    }
}
