/**
 * System constants for the pipeline
 * Centralizes magic numbers for maintainability
 */

export const PACKAGE_VERSION = '1.0.0';

// ============================================
// External tools
// ============================================

export const RASTER_DEFAULTS = {
    /** Resolution used when probing whether a page exists */
    PROBE_DPI: 10,
    /** Name of the document copy inside a raster temp dir */
    INPUT_FILENAME: 'input.pdf',
    /** Output prefix for converted pages (`page-<n>.png`) */
    PAGE_PREFIX: 'page',
    /** Output prefix for probe renders (`probe-<n>.png`) */
    PROBE_PREFIX: 'probe',
    /** Lower and upper bounds accepted for DPI */
    MIN_DPI: 50,
    MAX_DPI: 600,
} as const;

export const OCR_DEFAULTS = {
    /** LSTM engine only */
    ENGINE_MODE: '1',
    /** Fully automatic page segmentation */
    PAGE_SEG_MODE: '3',
    /** Cap on the default worker count */
    MAX_DEFAULT_WORKERS: 32,
} as const;

// ============================================
// Breaker call sites
// ============================================

export const BREAKER_NAMES = {
    RASTERIZER: 'rasterizer',
    OCR: 'ocr',
    ANALYSIS: 'analysis',
} as const;

// ============================================
// Analysis providers
// ============================================

export const ANALYSIS_DEFAULTS = {
    /** USD per 1K tokens used for cost estimates */
    COST_PER_1K_TOKENS: 0.01,
    /** Confidence tiers for remote analysis output */
    CONFIDENCE: {
        TRUNCATED: 60,
        LONG: 90,
        MEDIUM: 80,
        SHORT: 70,
    },
    /** Content length thresholds for the tiers above */
    LONG_CONTENT_CHARS: 1000,
    MEDIUM_CONTENT_CHARS: 500,
    SYSTEM_PROMPT:
        'You extract the full text of PDF documents. Return the text of every page in reading order, ' +
        'preserving headings, lists and table rows. Do not summarize, translate or add commentary.',
} as const;

// ============================================
// Upload validation
// ============================================

export const UPLOAD_RULES = {
    EXTENSION: '.pdf',
    MAGIC: '%PDF-',
} as const;
