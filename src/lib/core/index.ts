export {
  CertificateRequestOrchestrator,
  type OrchestratorDependencies,
  type RequestOutcome,
  type RequestResult,
} from './request-orchestrator.js';
export {
  ChallengeExecutor,
  buildLegoCommand,
  type ChallengeExecutorOptions,
  type LegoCommand,
} from './challenge-executor.js';
export { CertificateRetriever, splitPemChain, buildCertificateChain } from './certificate-retriever.js';
