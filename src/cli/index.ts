#!/usr/bin/env node
import path from 'node:path';
import { Command } from 'commander';
import { validatePatentNumber } from '../extract/certificate-patterns.js';
import { createPipeline, createServices, VERSION, type Pipeline } from '../pipeline.js';
import type { ExtractedFields, PipelineConfig, ScanOutcome } from '../types/index.js';
import { parseOverrides, resolveConfig } from '../utils/config.js';
import { initLogger, getLogger } from '../utils/logger.js';
import { definedEntries } from '../utils/objects.js';

interface CommonOptions {
    config?: string;
    db?: string;
    logLevel?: string;
    jsonLogs?: boolean;
}

interface ResolveOptions extends CommonOptions {
    title?: string;
    authors?: string;
    year?: string;
    venue?: string;
    doi?: string;
}

const program = new Command();

program
    .name('scholarscan')
    .description('Extract and resolve metadata for papers, patents and software certificates in a folder.')
    .version(VERSION);

function withCommonOptions(command: Command): Command {
    return command
        .option('-c, --config <path>', 'Config file path')
        .option('--db <path>', 'SQLite database path')
        .option('--log-level <level>', 'Log level: debug | info | warn | error | silent')
        .option('--json-logs', 'Output JSON logs');
}

/**
 * Flags left unset fall through to env vars, the config file, then defaults.
 */
async function loadConfig(opts: CommonOptions): Promise<PipelineConfig> {
    const cliConfig = parseOverrides(
        { db: opts.db, logLevel: opts.logLevel, jsonLogs: opts.jsonLogs },
        'command line'
    );
    const config = await resolveConfig(cliConfig, { configPath: opts.config });
    initLogger({ level: config.logLevel, jsonLogs: config.jsonLogs });
    return config;
}

function fail(message: string, error: unknown): void {
    getLogger().error({ error: error instanceof Error ? error.message : String(error) }, message);
    process.exitCode = 1;
}

function printSummary(outcomes: ScanOutcome[]): void {
    const counts = new Map<string, number>();
    for (const outcome of outcomes) {
        const key = outcome.state === 'done' ? (outcome.status ?? outcome.kind) : outcome.state;
        counts.set(key, (counts.get(key) ?? 0) + 1);
    }

    console.log(`\nProcessed ${outcomes.length} files\n`);
    for (const [key, count] of [...counts.entries()].sort()) {
        console.log(`  ${key.padEnd(14)} ${count}`);
    }
    console.log('');
}

// ─── SCAN command ─────────────────────────────────────────

withCommonOptions(
    program
        .command('scan')
        .description('Scan a folder and record every paper and certificate found')
        .argument('<root>', 'Folder to scan')
).action(async (root: string, opts: CommonOptions) => {
    let pipeline: Pipeline | undefined;
    try {
        const config = await loadConfig(opts);
        pipeline = createPipeline(config);
        const logger = getLogger();

        const controller = new AbortController();
        process.once('SIGINT', () => controller.abort());

        logger.info({ root: path.resolve(root), db: config.db }, 'Starting scan');
        const run = pipeline.orchestrator.scan(path.resolve(root), controller.signal);
        let step = await run.next();
        while (!step.done) {
            const progress = step.value;
            logger.info({ progress: `${progress.index}/${progress.total}` }, progress.message);
            step = await run.next();
        }

        printSummary(step.value);
    } catch (error) {
        fail('Scan failed', error);
    } finally {
        pipeline?.close();
    }
});

// ─── OCR command ──────────────────────────────────────────

withCommonOptions(
    program
        .command('ocr')
        .description('Retry papers left in needs_ocr through the OCR service')
        .argument('<root>', 'Folder the files were scanned from')
).action(async (root: string, opts: CommonOptions) => {
    let pipeline: Pipeline | undefined;
    try {
        const config = await loadConfig(opts);
        pipeline = createPipeline(config);
        const logger = getLogger();

        if (!pipeline.ocr.isConfigured()) {
            throw new Error('OCR service is not configured (set ocr.url and ocr.key)');
        }

        const controller = new AbortController();
        process.once('SIGINT', () => controller.abort());

        logger.info({ root: path.resolve(root) }, 'Starting OCR remedy');
        const run = pipeline.orchestrator.remedyPending(path.resolve(root), controller.signal);
        let step = await run.next();
        while (!step.done) {
            const progress = step.value;
            logger.info({ progress: `${progress.index}/${progress.total}` }, progress.message);
            step = await run.next();
        }
        const outcomes = step.value;

        printSummary(outcomes);
    } catch (error) {
        fail('OCR remedy failed', error);
    } finally {
        pipeline?.close();
    }
});

// ─── CERTIFICATE command ──────────────────────────────────

withCommonOptions(
    program
        .command('certificate')
        .description('Classify one certificate and print the extracted fields')
        .argument('<file>', 'Certificate PDF or image')
).action(async (file: string, opts: CommonOptions) => {
    try {
        const config = await loadConfig(opts);
        const { certificates } = createServices(config);
        const result = await certificates.extract(path.resolve(file));

        if (result.kind === 'neither') {
            console.log(`No patent or software certificate detected (${result.method})`);
            return;
        }

        console.log(`\n${result.kind === 'patent' ? 'Patent' : 'Software copyright'} (${result.method})\n`);
        for (const [key, value] of Object.entries(result.fields)) {
            console.log(`  ${key.padEnd(20)} ${String(value)}`);
        }
        console.log(`\n  complete: ${result.complete}\n`);
    } catch (error) {
        fail('Certificate extraction failed', error);
    }
});

// ─── RESOLVE command ──────────────────────────────────────

withCommonOptions(
    program
        .command('resolve')
        .description('Resolve a paper against Crossref and OpenAlex')
        .argument('[file]', 'Paper PDF; flags override what is extracted from it')
        .option('-t, --title <title>', 'Paper title')
        .option('-a, --authors <authors>', 'Authors, "; "-separated')
        .option('-y, --year <year>', 'Publication year')
        .option('--venue <venue>', 'Journal or conference')
        .option('--doi <doi>', 'DOI')
).action(async (file: string | undefined, opts: ResolveOptions) => {
    try {
        const config = await loadConfig(opts);
        const { extraction, resolver } = createServices(config);

        const extracted: ExtractedFields = file ? (await extraction.extract(path.resolve(file))).fields : {};
        const year = opts.year ? parseInt(opts.year, 10) : undefined;
        const fields: ExtractedFields = {
            ...extracted,
            ...definedEntries<ExtractedFields>({
                title: opts.title,
                authors: opts.authors,
                year: year !== undefined && !Number.isNaN(year) ? year : undefined,
                venue: opts.venue,
                doi: opts.doi?.toLowerCase(),
            }),
        };

        const result = await resolver.resolve(fields);
        console.log(`\nSource:     ${result.source}`);
        console.log(`Confidence: ${result.confidence}`);
        console.log(`DOI:        ${result.doi ?? '-'}\n`);
        for (const [key, value] of Object.entries(result.merged)) {
            console.log(`  ${key.padEnd(8)} ${String(value)}`);
        }
        console.log('');
    } catch (error) {
        fail('Resolve failed', error);
    }
});

// ─── VALIDATE-PATENT command ──────────────────────────────

program
    .command('validate-patent')
    .description('Check a patent number against the ZL202211551727.X format')
    .argument('<number>', 'Patent number')
    .action((value: string) => {
        const { valid, reason } = validatePatentNumber(value);
        if (valid) {
            console.log(`${value}: valid`);
            return;
        }
        console.error(`${value}: ${reason}`);
        process.exitCode = 1;
    });

// ─── INSPECT command ──────────────────────────────────────

withCommonOptions(
    program
        .command('inspect')
        .description('Show database statistics')
).action(async (opts: CommonOptions) => {
    let pipeline: Pipeline | undefined;
    try {
        pipeline = createPipeline(await loadConfig(opts));
        const stats = pipeline.store.getStats();

        console.log('\nLibrary Statistics\n');
        console.log(`  Files:     ${stats.files}`);
        console.log(`  Papers:    ${stats.papers}`);
        console.log(`  Patents:   ${stats.patents}`);
        console.log(`  Software:  ${stats.softwares}`);
        console.log(`  Certificates needing review: ${stats.certificatesNeedingReview}`);

        if (Object.keys(stats.filesByStatus).length > 0) {
            console.log('\n  File Status:');
            for (const [status, count] of Object.entries(stats.filesByStatus)) {
                console.log(`    ${status}: ${count}`);
            }
        }

        console.log('');
    } catch (error) {
        fail('Inspect failed', error);
    } finally {
        pipeline?.close();
    }
});

program.parseAsync().catch((error: unknown) => fail('Command failed', error));
