import type { RegisteredAgent } from './agent.js';
import { ConfigurationError, UnknownAgentError } from './errors.js';

// ── Registry ─────────────────────────────────────────────────

/**
 * Name → agent table. Populated once during startup, then frozen; after
 * `freeze()` lookups are the only operation, so concurrent runs share it
 * without coordination.
 */
export class AgentRegistry {
  private readonly agents = new Map<string, RegisteredAgent>();
  private frozen = false;

  register(agent: RegisteredAgent): this {
    if (this.frozen) {
      throw new ConfigurationError(
        `Cannot register "${agent.name}": registry is frozen`,
      );
    }
    if (this.agents.has(agent.name)) {
      throw new ConfigurationError(`Agent "${agent.name}" is already registered`);
    }

    this.agents.set(agent.name, agent);
    return this;
  }

  freeze(): this {
    this.frozen = true;
    return this;
  }

  get isFrozen(): boolean {
    return this.frozen;
  }

  has(name: string): boolean {
    return this.agents.has(name);
  }

  /** Throws `UnknownAgentError` for names never registered. */
  get(name: string): RegisteredAgent {
    const agent = this.agents.get(name);
    if (!agent) throw new UnknownAgentError(name, this.names());
    return agent;
  }

  names(): string[] {
    return [...this.agents.keys()];
  }

  list(): RegisteredAgent[] {
    return [...this.agents.values()];
  }
}
