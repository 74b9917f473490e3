import { Dataset, FilterRange } from "./assessmentTypes.js";
import { ValidationError } from "./errors.js";
import { createRange } from "./filter.js";
import { SessionParams } from "./session.js";

export type Command =
    | { kind: "age"; range: FilterRange }
    | { kind: "iq"; range: FilterRange }
    | { kind: "metric"; name: string }
    | { kind: "value"; value: number }
    | { kind: "score"; metric: string; value: number }
    | { kind: "show" }
    | { kind: "metrics" }
    | { kind: "export"; path: string }
    | { kind: "reload" }
    | { kind: "help" }
    | { kind: "quit" };

export const HELP_TEXT = [
    "age <min> <max>          set the age range (inclusive)",
    "iq <min> <max>           set the IQ range (inclusive)",
    "metric <name>            select the metric to summarize",
    "value <number>           set the observed value of the selected metric",
    "score <metric> <number>  set the observed value of any metric",
    "show                     recompute and print",
    "metrics                  list metric columns and data bounds",
    "export <path>            write the last chart as JSON",
    "reload                   reload the data file",
    "help                     this list",
    "quit                     leave",
].join("\n");

export function parseObservedValue(text: string | undefined): number {
    const value = text === undefined || text.trim() === "" ? NaN : Number(text);
    if (!Number.isFinite(value)) {
        throw new ValidationError("INVALID_OBSERVED_VALUE", `observed value must be a number (got ${text ?? "nothing"})`);
    }
    return value;
}

//"20 30" or "20,30"
export function parseRange(text: string, name: string): FilterRange {
    const parts = text.split(/[\s,]+/).filter(part => part !== "");
    if (parts.length !== 2) {
        throw new ValidationError("INVALID_INPUT", `${name} needs a minimum and a maximum (got "${text}")`);
    }
    return createRange(Number(parts[0]), Number(parts[1]), name);
}

function requireArgs(args: string[], count: number, usage: string): void {
    if (args.length !== count) {
        throw new ValidationError("INVALID_INPUT", `usage: ${usage}`);
    }
}

export function parseCommand(line: string): Command {
    const [keyword = "", ...args] = line.trim().split(/\s+/).filter(token => token !== "");
    switch (keyword.toLowerCase()) {
        case "":
        case "show":
            return { kind: "show" };
        case "age":
            return { kind: "age", range: parseRange(args.join(" "), "age range") };
        case "iq":
            return { kind: "iq", range: parseRange(args.join(" "), "IQ range") };
        case "metric":
            requireArgs(args, 1, "metric <name>");
            return { kind: "metric", name: args[0] };
        case "value":
            requireArgs(args, 1, "value <number>");
            return { kind: "value", value: parseObservedValue(args[0]) };
        case "score":
            requireArgs(args, 2, "score <metric> <number>");
            return { kind: "score", metric: args[0], value: parseObservedValue(args[1]) };
        case "metrics":
            return { kind: "metrics" };
        case "export":
            requireArgs(args, 1, "export <path>");
            return { kind: "export", path: args[0] };
        case "reload":
            return { kind: "reload" };
        case "help":
            return { kind: "help" };
        case "quit":
        case "exit":
            return { kind: "quit" };
        default:
            throw new ValidationError("INVALID_INPUT", `unknown command "${keyword}", type help for a list`);
    }
}

function requireMetric(dataset: Dataset, metric: string): void {
    if (!dataset.metricColumns.includes(metric)) {
        throw new ValidationError("UNKNOWN_METRIC", `unknown metric column "${metric}" (available: ${dataset.metricColumns.join(", ")})`);
    }
}

/**
 * New session parameters after a command. Commands that do not change the
 * parameters return them as they are.
 */
export function applyCommand(dataset: Dataset, params: SessionParams, command: Command): SessionParams {
    switch (command.kind) {
        case "age":
            return { ...params, ageRange: command.range };
        case "iq":
            return { ...params, iqRange: command.range };
        case "metric":
            requireMetric(dataset, command.name);
            return { ...params, metricColumn: command.name };
        case "value":
            return { ...params, scores: { ...params.scores, [params.metricColumn]: command.value } };
        case "score":
            requireMetric(dataset, command.metric);
            return { ...params, scores: { ...params.scores, [command.metric]: command.value } };
        default:
            return params;
    }
}
