/**
 * Core orchestration module.
 * Retry → step → pipeline → agent → registry → orchestrator.
 * Pure logic: no CLI, no browser, no provider APIs.
 */

export * from './errors.js';
export { RetryPolicy } from './retry.js';
export type { RetryAttempt, RetryPolicyOptions } from './retry.js';
export { Pipeline } from './pipeline.js';
export type { PipelineContext, StepContext, ValidationStep } from './pipeline.js';
export { defineAgent } from './agent.js';
export type {
  AdmittedTarget,
  AgentDefinition,
  AgentReport,
  AgentRunContext,
  BaseState,
  RegisteredAgent,
} from './agent.js';
export { AgentRegistry } from './registry.js';
export { Orchestrator } from './orchestrator.js';
export type { OrchestratorOptions, RunEvent } from './orchestrator.js';
export { countFindings, isCleanReport, summarizeResults } from './results.js';
export type { Report, ReportSummary, RunPhase, RunResult, RunStatus } from './results.js';
