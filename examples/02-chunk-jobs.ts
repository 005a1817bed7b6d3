/**
 * 02 - Chunk Jobs
 *
 * Split a long PDF into overlapping chunks, follow the job through the progress
 * stream and read the merged result. Set OPENAI_API_KEY to analyse chunks with
 * OpenAI instead of local OCR.
 *
 * Run: npx tsx examples/02-chunk-jobs.ts path/to/book.pdf
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import {
    createOcrPipeline,
    FileTooLargeError,
    OcrPipelineError,
    QueueFullError,
} from '../src/index.js';

async function main(): Promise<void> {
    const file = process.argv[2];
    if (!file) {
        console.error('Usage: 02-chunk-jobs.ts <file.pdf>');
        process.exitCode = 1;
        return;
    }

    const apiKey = process.env.OPENAI_API_KEY;
    const pipeline = createOcrPipeline({
        chunking: { chunkSize: 10, overlap: 1 },
        analysis: apiKey ? { provider: 'openai', apiKey } : { provider: 'ocr' },
    });

    try {
        const buffer = await fs.readFile(file);
        const upload = await pipeline.upload(buffer, { filename: path.basename(file) });
        console.log(`Job ${upload.jobId}: ${upload.totalPages} pages in ${upload.totalChunks} chunks`);

        for await (const update of pipeline.streamProgress(upload.jobId)) {
            console.log(`   ${update.processed}/${update.total} chunks (${update.percentage}%)`);
        }

        const result = pipeline.getResult(upload.jobId);
        console.log(`\nStatus: ${result.status}, confidence ${result.confidence}`);
        if (result.error) {
            console.log(`Error: ${result.error}`);
        }
        console.log('\n' + result.content);
    } catch (error) {
        if (error instanceof FileTooLargeError) {
            console.error(`Too large: ${error.message}`);
        } else if (error instanceof QueueFullError) {
            console.error('Service busy, try again later');
        } else if (error instanceof OcrPipelineError) {
            console.error(`${error.code}: ${error.message} (correlation ${error.correlationId})`);
        } else {
            throw error;
        }
        process.exitCode = 1;
    } finally {
        await pipeline.shutdown();
    }
}

main().catch((error: unknown) => {
    console.error(error);
    process.exitCode = 1;
});
