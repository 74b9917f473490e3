#!/usr/bin/env node
import * as readline from 'readline/promises';
import fs from 'fs';
import { parseArgs } from 'util';
import * as config from './config.js';
import { createLogger, setLogLevel } from './logger.js';
import { Dataset } from './assessmentTypes.js';
import { isLoadError, isValidationError, ValidationError } from './errors.js';
import { load } from './loader.js';
import { datasetExtent } from './filter.js';
import { initialParams, recompute, RecomputeOutcome, SessionParams } from './session.js';
import { applyCommand, Command, HELP_TEXT, parseCommand, parseObservedValue, parseRange } from './commands.js';
import { formatSummary, renderChart } from './chart/render.js';

const logger = createLogger(__filename);

const USAGE = `usage: assessment [--file path] [--age min,max] [--iq min,max] [--metric name] [--value n] [--once] [--export path] [--watch] [--log-level level]`;

const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'] as const;

function isLogLevel(value: string): value is typeof LOG_LEVELS[number] {
    return LOG_LEVELS.some(level => level === value);
}

type Session = {
    file: string;
    dataset: Dataset;
    params: SessionParams;
    last?: RecomputeOutcome;
}

// +++ OUTPUT +++

function printOutcome(outcome: RecomputeOutcome){
    if (outcome.summary) {
        console.log(formatSummary(outcome.summary, outcome.result));
    }
    if (outcome.chart) {
        console.log(renderChart(outcome.chart));
    } else {
        console.log("(no chart: nothing could be scored for the current parameters)");
    }
    for (const warning of outcome.warnings) {
        console.log(`Warning: ${warning}`);
    }
}

function printMetrics(dataset: Dataset){
    const extent = datasetExtent(dataset);
    console.log(`${dataset.source}: ${dataset.records.length} records`);
    console.log(`age ${extent.age.min} ~ ${extent.age.max}, IQ ${extent.iq.min} ~ ${extent.iq.max}`);
    console.log(`metrics: ${dataset.metricColumns.join(", ")}`);
}

function refresh(session: Session){
    session.last = recompute(session.dataset, session.params);
    printOutcome(session.last);
}

function exportChart(session: Session, path: string){
    const chart = session.last?.chart;
    if (!chart) {
        throw new ValidationError("INVALID_INPUT", "no chart to export for the current parameters");
    }
    try{
        fs.writeFileSync(path, JSON.stringify(chart, null, 2));
        console.log(`Chart written to ${path}`);
    }catch(error){
        logger.error(`Could not write chart to ${path}`, error);
        console.log(`Error: could not write ${path}`);
    }
}

//a failed reload keeps the previous dataset; only the startup load is fatal
function reload(session: Session){
    try{
        session.dataset = load(session.file);
        logger.info(`Reloaded ${session.file}`);
    }catch(error){
        if (!isLoadError(error)) throw error;
        logger.error("Reload failed, keeping the previous data", error.message);
        console.log(`Error: ${error.message}`);
        return;
    }
    refresh(session);
}

// +++ INTERACTION +++

//returns false when the session should end
function handleCommand(session: Session, command: Command): boolean {
    switch (command.kind) {
        case "quit":
            return false;
        case "help":
            console.log(HELP_TEXT);
            return true;
        case "metrics":
            printMetrics(session.dataset);
            return true;
        case "export":
            exportChart(session, command.path);
            return true;
        case "reload":
            reload(session);
            return true;
        default:
            session.params = applyCommand(session.dataset, session.params, command);
            refresh(session);
            return true;
    }
}

function handleLine(session: Session, line: string): boolean {
    try{
        return handleCommand(session, parseCommand(line));
    }catch(error){
        if (!isValidationError(error)) throw error;
        logger.debug(`Rejected input "${line}": ${error.code}`);
        console.log(`Warning: ${error.message}`);
        return true;
    }
}

async function promptLoop(session: Session){
    const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
    rl.setPrompt("> ");
    rl.prompt();
    try{
        for await (const line of rl) {
            if (!handleLine(session, line)) break;
            rl.prompt();
        }
    }finally{
        rl.close();
    }
}

// +++ STARTUP +++

function startParams(dataset: Dataset, values: { age?: string; iq?: string; metric?: string; value?: string }): SessionParams {
    let params = initialParams(dataset);
    if (values.age !== undefined) params = { ...params, ageRange: parseRange(values.age, "age range") };
    if (values.iq !== undefined) params = { ...params, iqRange: parseRange(values.iq, "IQ range") };
    if (values.metric !== undefined) params = applyCommand(dataset, params, { kind: "metric", name: values.metric });
    if (values.value !== undefined) params = applyCommand(dataset, params, { kind: "value", value: parseObservedValue(values.value) });
    return params;
}

async function main(){
    const { values } = parseArgs({
        options: {
            file: { type: "string", short: "f" },
            age: { type: "string" },
            iq: { type: "string" },
            metric: { type: "string" },
            value: { type: "string" },
            once: { type: "boolean" },
            export: { type: "string" },
            watch: { type: "boolean" },
            help: { type: "boolean", short: "h" },
            "log-level": { type: "string" },
        },
    });
    const logLevel = values["log-level"];
    if (logLevel !== undefined) {
        if (!isLogLevel(logLevel)) {
            console.error(`Error: unknown log level "${logLevel}" (use ${LOG_LEVELS.join(", ")})`);
            process.exitCode = 2;
            return;
        }
        setLogLevel(logLevel);
    }
    if (values.help) {
        console.log(USAGE);
        console.log(HELP_TEXT);
        return;
    }

    const file = values.file ?? config.data_file;
    let dataset: Dataset;
    try{
        dataset = load(file);
    }catch(error){
        if (!isLoadError(error)) throw error;
        logger.fatal(`${error.code}: ${error.message}`);
        console.error(`Error: ${error.message}`);
        process.exitCode = 1;
        return;
    }

    let params: SessionParams;
    try{
        params = startParams(dataset, values);
    }catch(error){
        if (!isValidationError(error)) throw error;
        console.error(`Error: ${error.message}`);
        console.error(USAGE);
        process.exitCode = 2;
        return;
    }

    const session: Session = { file, dataset, params };
    refresh(session);

    if (values.once) {
        if (values.export !== undefined) {
            try{
                exportChart(session, values.export);
            }catch(error){
                if (!isValidationError(error)) throw error;
                console.log(`Warning: ${error.message}`);
                process.exitCode = 1;
            }
        }
        return;
    }

    if (values.watch) {
        fs.watchFile(file, { interval: config.watch_interval_ms }, (current, previous) => {
            if (current.mtimeMs !== previous.mtimeMs) {
                logger.info(`${file} changed, reloading`);
                reload(session);
            }
        });
    }
    try{
        await promptLoop(session);
    }finally{
        if (values.watch) fs.unwatchFile(file);
    }
}

main().catch((error) => {
    logger.fatal("Unexpected failure", error);
    process.exitCode = 1;
});
