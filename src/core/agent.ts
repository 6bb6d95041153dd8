import type { AuthConfig, Finding, Target } from '../schema/index.js';
import type { Pipeline } from './pipeline.js';
import { ValidatorError } from './errors.js';

// ── State contract ───────────────────────────────────────────

/** Rendered outcome every agent attaches as its last step. */
export interface AgentReport<F extends Finding = Finding> {
  passed: boolean;
  headline: string;
  text: string;
  findings: readonly F[];
}

/**
 * Fields every agent state carries. Agents extend this with their own
 * working fields; `report` is filled in by the final step.
 */
export interface BaseState {
  url: string;
  auth?: AuthConfig | undefined;
  report?: AgentReport | undefined;
}

/** An admitted target: address already validated and normalized. */
export type AdmittedTarget = Readonly<Target>;

// ── Definition ───────────────────────────────────────────────

export interface AgentDefinition<S extends BaseState> {
  readonly name: string;
  readonly description: string;
  readonly pipeline: Pipeline<S>;
  /**
   * Pure: builds a fresh state for one run. Target options are parsed
   * here, so bad options fail this run only.
   */
  createInitialState(target: AdmittedTarget): S;
}

export interface AgentRunContext {
  signal?: AbortSignal | undefined;
}

/**
 * Type-erased handle stored in the registry, so agents with different
 * state shapes can share one table.
 */
export interface RegisteredAgent {
  readonly name: string;
  readonly description: string;
  readonly steps: readonly string[];
  run(target: AdmittedTarget, context: AgentRunContext): Promise<BaseState>;
}

export function defineAgent<S extends BaseState>(
  definition: AgentDefinition<S>,
): RegisteredAgent {
  return Object.freeze({
    name: definition.name,
    description: definition.description,
    steps: Object.freeze(definition.pipeline.stepNames),

    async run(
      target: AdmittedTarget,
      context: AgentRunContext,
    ): Promise<BaseState> {
      const initial = definition.createInitialState(target);
      const final = await definition.pipeline.run(initial, {
        agent: definition.name,
        url: target.url,
        signal: context.signal,
      });

      if (!final.report) {
        throw new ValidatorError(
          'permanent',
          `Agent "${definition.name}" finished without producing a report`,
        );
      }

      return final;
    },
  });
}
