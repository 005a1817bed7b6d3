/**
 * Analysis Provider Factory
 *
 * Creates the chunk analysis provider selected by `analysis.provider`.
 */

import type { ResolvedConfig } from '../../types/config.types.js';
import type { IAnalysisProvider } from '../../types/analysis-provider.types.js';
import { AnalysisProviderEnum } from '../../types/enums.js';
import { ConfigurationError } from '../../errors/index.js';
import type { Logger } from '../../utils/logger.js';
import { OpenAIAnalysisProvider } from './openai.provider.js';
import { OcrAnalysisProvider, type OcrAnalysisDependencies } from './ocr.provider.js';

/**
 * Create an analysis provider based on configuration
 * @throws ConfigurationError for an unknown provider or a missing OpenAI key
 */
export function createAnalysisProvider(
    config: ResolvedConfig,
    deps: OcrAnalysisDependencies,
    logger: Logger
): IAnalysisProvider {
    const provider: string = config.analysis.provider;

    switch (provider) {
        case AnalysisProviderEnum.OPENAI:
            return OpenAIAnalysisProvider.fromConfig(config.analysis, logger);

        case AnalysisProviderEnum.OCR:
            return new OcrAnalysisProvider(
                {
                    dpi: config.raster.dpi,
                    confidenceThreshold: config.analysis.confidenceThreshold,
                },
                deps,
                logger
            );

        default:
            throw new ConfigurationError(`Unknown analysis provider: ${provider}`, { provider });
    }
}
