/**
 * 01 - Basic Usage
 *
 * OCR a whole PDF in one call and print the merged text.
 *
 * Run: npx tsx examples/01-basic-usage.ts path/to/scan.pdf
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { createOcrPipeline } from '../src/index.js';

async function main(): Promise<void> {
    const file = process.argv[2];
    if (!file) {
        console.error('Usage: 01-basic-usage.ts <file.pdf>');
        process.exitCode = 1;
        return;
    }

    const pipeline = createOcrPipeline({
        raster: { dpi: 300 },
        ocr: { language: 'eng' },
    });

    pipeline.events.on('progress:update', snapshot => {
        console.log(`   ${snapshot.processed}/${snapshot.total} pages (${snapshot.percentage}%)`);
    });

    const buffer = await fs.readFile(file);
    const result = await pipeline.extract(buffer, { filename: path.basename(file) });

    console.log(`\nPages: ${result.metadata.numPages}`);
    console.log(`Confidence: ${result.confidence}`);
    console.log(`Time: ${result.metadata.processingTimeSeconds}s`);
    if (result.metadata.failedPages.length > 0) {
        console.log(`Failed pages: ${result.metadata.failedPages.join(', ')}`);
    }
    console.log('\n' + result.text);

    await pipeline.shutdown();
}

main().catch((error: unknown) => {
    console.error(error);
    process.exitCode = 1;
});
