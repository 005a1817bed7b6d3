export { ExtractionEngine, type ExtractionEngineDependencies } from './extraction.engine.js';
export { IngestionEngine, type IngestionEngineDependencies } from './ingestion.engine.js';
export {
    JobOrchestrator,
    buildResultView,
    type JobOrchestratorConfig,
    type JobOrchestratorDependencies,
} from './job.orchestrator.js';
