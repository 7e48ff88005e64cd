export {
  LocalExecutionBackend,
  type ExecutionBackend,
  type ExecOptions,
  type ExecResult,
} from './execution-backend.js';
export { InMemoryScheduler, type Scheduler } from './scheduler.js';
export { StaticLeadership, type LeadershipOracle } from './leadership.js';
export { UnitStatus, type StatusSink } from './status-sink.js';
export { InMemoryPublisher, FileCertificatePublisher, type CertificatePublisher } from './publisher.js';
