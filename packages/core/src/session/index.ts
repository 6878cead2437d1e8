export {
  SessionOrchestrator,
  SSH_CONNECTION_FAILURE,
  FORWARDED_SIGNALS,
  type SessionDependencies,
  type SessionKeyOptions,
  type SessionRequest,
  type SessionSettings,
} from './orchestrator.js';
export { ChildProcessLauncher, exitStatus } from './process.js';
