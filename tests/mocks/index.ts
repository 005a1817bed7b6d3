/**
 * Mock Index
 *
 * Central export for all test mocks
 */

// Logger
export { createMockLogger, type MockLogger } from './logger.mock.js';

// External tools
export {
    FakeCommandRunner,
    commandOk,
    commandFailed,
    pdfInfoOutput,
    fakePdftoppm,
    pdftoppmOutputName,
    tesseractTsv,
    type CommandHandler,
    type FakePdftoppmOptions,
    type RecordedCommand,
} from './command-runner.mock.js';

// Services
export { createMockOcrEngine, type MockOcrEngine } from './ocr-engine.mock.js';
export { createMockAnalysisProvider, type MockAnalysisProvider } from './analysis-provider.mock.js';
export { createMockStorageProbe, type MockStorageProbe } from './storage.mock.js';

// Fixtures
export {
    createPdfBuffer,
    createPageImages,
    createChunk,
    createChunkResult,
    createTestConfig,
    createTempDir,
    listFiles,
} from './fixtures.js';
