#!/usr/bin/env node

import 'dotenv/config';
import { Command } from 'commander';
import * as fs from 'fs/promises';
import * as path from 'path';
import { PACKAGE_VERSION } from '../config/constants.js';
import { envToConfig, getEnv } from '../config/env.js';
import { errorMessage } from '../errors/index.js';
import { OcrPipelineFactory, createOcrPipeline } from '../ocr-pipeline.factory.js';
import { createApp } from '../server/app.js';
import { PdfChunker } from '../services/pdf.chunker.js';
import { createLogger } from '../utils/logger.js';
import { StatfsStorageProbe } from '../utils/storage.js';

interface ServeOptions {
    port?: string;
}

interface ExtractOptions {
    dpi?: string;
    output?: string;
}

interface SplitOptions {
    chunkSize?: string;
    overlap?: string;
    outDir: string;
}

const program = new Command();

program
    .name('pdf-ocr')
    .description('PDF OCR pipeline - extraction, chunking and HTTP service')
    .version(PACKAGE_VERSION);

function parseInteger(value: string | undefined, name: string): number | undefined {
    if (value === undefined) return undefined;
    const parsed = Number.parseInt(value, 10);
    if (!Number.isInteger(parsed)) {
        throw new Error(`${name} must be an integer, got "${value}"`);
    }
    return parsed;
}

function fail(error: unknown): never {
    console.error('Error:', errorMessage(error));
    process.exit(1);
}

program
    .command('serve')
    .description('Start the HTTP service')
    .option('-p, --port <port>', 'Port to listen on (default: PORT or 8000)')
    .action(async (options: ServeOptions) => {
        try {
            const env = getEnv();
            const port = parseInteger(options.port, 'port') ?? env.PORT;
            const pipeline = createOcrPipeline(envToConfig(env));
            const app = createApp(pipeline);

            const server = app.listen(port, () => {
                pipeline.logger.info('HTTP service listening', { port });
            });

            const stop = (signal: string): void => {
                pipeline.logger.info('Stopping HTTP service', { signal });
                server.close();
                pipeline
                    .shutdown()
                    .then(() => process.exit(0))
                    .catch((error: unknown) => fail(error));
            };
            process.once('SIGINT', () => stop('SIGINT'));
            process.once('SIGTERM', () => stop('SIGTERM'));
        } catch (error) {
            fail(error);
        }
    });

program
    .command('extract <file>')
    .description('OCR every page of a PDF and print the text')
    .option('-d, --dpi <dpi>', 'Rendering resolution')
    .option('-o, --output <file>', 'Write the text to a file instead of stdout')
    .action(async (file: string, options: ExtractOptions) => {
        try {
            const dpi = parseInteger(options.dpi, 'dpi');
            const pipeline = createOcrPipeline(envToConfig(getEnv()));
            const buffer = await fs.readFile(file);

            const result = await pipeline.extract(buffer, {
                filename: path.basename(file),
                ...(dpi !== undefined && { dpi }),
            });

            if (options.output) {
                await fs.writeFile(options.output, result.text, 'utf-8');
                console.log(`Text written to ${options.output}`);
            } else {
                console.log(result.text);
            }

            const { metadata } = result;
            console.error(
                `\nPages: ${metadata.numPages} | confidence: ${result.confidence}` +
                ` | dpi: ${metadata.dpi} | workers: ${metadata.workers}` +
                ` | time: ${metadata.processingTimeSeconds}s`
            );
            if (metadata.failedPages.length > 0) {
                console.error(`Failed pages: ${metadata.failedPages.join(', ')}`);
            }

            await pipeline.shutdown();
        } catch (error) {
            fail(error);
        }
    });

program
    .command('split <file>')
    .description('Split a PDF into overlapping page-range chunk files')
    .option('-c, --chunk-size <pages>', 'Pages per chunk')
    .option('--overlap <pages>', 'Pages shared by adjacent chunks')
    .option('--out-dir <dir>', 'Output directory', '.')
    .action(async (file: string, options: SplitOptions) => {
        try {
            const env = getEnv();
            const config = OcrPipelineFactory.resolveConfig(envToConfig(env));
            const logger = createLogger({ ...config.logging, structured: false });
            const outDir = path.resolve(options.outDir);
            const chunker = new PdfChunker(
                { workDir: outDir, chunking: config.chunking, limits: config.limits },
                { storage: new StatfsStorageProbe() },
                logger
            );

            const buffer = await fs.readFile(file);
            const name = path.basename(file, path.extname(file));
            const result = await chunker.split(buffer, {
                chunkSize: parseInteger(options.chunkSize, 'chunk size') ?? config.chunking.chunkSize,
                overlap: parseInteger(options.overlap, 'overlap') ?? config.chunking.overlap,
                jobId: name,
                filename: path.basename(file),
            });

            console.log(`Split ${result.totalPages} pages into ${result.chunks.length} chunks in ${result.workDir}:`);
            for (const chunk of result.chunks) {
                console.log(`  ${path.basename(chunk.filePath)}: pages ${chunk.startPage}-${chunk.endPage} (${chunk.sizeBytes} bytes)`);
            }
        } catch (error) {
            fail(error);
        }
    });

program.parseAsync().catch((error: unknown) => fail(error));
