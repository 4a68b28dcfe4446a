export { parseOutcomePattern } from './outcome-pattern.js';
export type { ProbeStopReason, ProbeSessionOptions, ProbeSessionSummary } from './probe-session.js';
export { runProbeSession, probeExitCode } from './probe-session.js';
