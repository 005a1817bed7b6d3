import type { OcrConfig } from '../../types/config.types.js';
import type { IOcrEngine, OcrOutput, PageImage } from '../../types/ocr.types.js';
import { BREAKER_NAMES, OCR_DEFAULTS } from '../../config/constants.js';
import { ToolFailureError } from '../../errors/index.js';
import type { Logger } from '../../utils/logger.js';
import type { ICommandRunner } from '../command.runner.js';
import type { CircuitBreaker, CircuitBreakerRegistry } from '../circuit-breaker.js';

export interface TesseractEngineDependencies {
    runner: ICommandRunner;
    breakers: CircuitBreakerRegistry;
}

interface TsvWord {
    block: string;
    line: string;
    text: string;
    confidence: number;
}

const TSV_WORD_LEVEL = '5';

/**
 * Clamp a confidence value into [0, 100]
 */
export function clampConfidence(value: number): number {
    if (!Number.isFinite(value)) return 0;
    return Math.min(100, Math.max(0, value));
}

/**
 * Rebuild text and mean word confidence from `tesseract ... tsv` output
 *
 * Words on a line are joined with spaces, lines with newlines and blocks with a
 * blank line. Words reported with confidence -1 do not count towards the mean.
 */
export function parseTesseractTsv(tsv: string): OcrOutput {
    const words: TsvWord[] = [];

    for (const row of tsv.split(/\r?\n/).slice(1)) {
        const columns = row.split('\t');
        if (columns.length < 12 || columns[0] !== TSV_WORD_LEVEL) continue;

        const text = columns.slice(11).join('\t').trim();
        if (!text) continue;

        words.push({
            block: `${columns[1]}:${columns[2]}`,
            line: `${columns[1]}:${columns[2]}:${columns[3]}:${columns[4]}`,
            text,
            confidence: Number.parseFloat(columns[10] ?? '-1'),
        });
    }

    const blocks: string[][][] = [];
    let currentBlock: string | undefined;
    let currentLine: string | undefined;

    for (const word of words) {
        if (word.block !== currentBlock) {
            blocks.push([]);
            currentBlock = word.block;
            currentLine = undefined;
        }
        const lines = blocks[blocks.length - 1] ?? [];
        if (word.line !== currentLine) {
            lines.push([]);
            currentLine = word.line;
        }
        lines[lines.length - 1]?.push(word.text);
    }

    const text = blocks
        .map(lines => lines.map(line => line.join(' ')).join('\n'))
        .join('\n\n');

    const scored = words
        .map(word => word.confidence)
        .filter(confidence => Number.isFinite(confidence) && confidence !== -1)
        .map(clampConfidence);

    const confidence = scored.length > 0
        ? scored.reduce((sum, value) => sum + value, 0) / scored.length
        : 0;

    return { text, confidence };
}

/**
 * OCR engine backed by the tesseract CLI
 * The page image goes in on stdin and TSV comes back on stdout.
 */
export class TesseractOcrEngine implements IOcrEngine {
    readonly name = 'tesseract';
    private readonly config: OcrConfig;
    private readonly runner: ICommandRunner;
    private readonly breaker: CircuitBreaker;
    private readonly logger: Logger;

    constructor(config: OcrConfig, deps: TesseractEngineDependencies, logger: Logger) {
        this.config = config;
        this.runner = deps.runner;
        this.breaker = deps.breakers.get(BREAKER_NAMES.OCR);
        this.logger = logger;
    }

    async recognize(image: PageImage): Promise<OcrOutput> {
        const args = [
            'stdin',
            'stdout',
            '-l', this.config.language,
            '--oem', OCR_DEFAULTS.ENGINE_MODE,
            '--psm', OCR_DEFAULTS.PAGE_SEG_MODE,
            'tsv',
        ];
        const timeoutMs = this.config.pageTimeoutMs;

        const output = await this.breaker.execute(async () => {
            const result = await this.runner.run(this.config.tesseractPath, args, {
                input: image.data,
                timeoutMs,
            });
            if (result.exitCode !== 0) {
                throw new ToolFailureError(
                    `tesseract failed on page ${image.pageNumber}: ${result.stderr.trim() || `exit code ${result.exitCode}`}`,
                    'tesseract',
                    { exitCode: result.exitCode, details: { pageNumber: image.pageNumber } }
                );
            }
            return result;
        }, { timeoutMs });

        const parsed = parseTesseractTsv(output.stdout.toString('utf8'));
        this.logger.debug('Page recognized', {
            pageNumber: image.pageNumber,
            confidence: parsed.confidence,
            characters: parsed.text.length,
        });
        return parsed;
    }
}
