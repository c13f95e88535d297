import { AgentRuntime } from '../runtime/agent-runtime';
import type { AgentRole } from '../runtime/types';
import type { AgentProfile, AgentSummary } from './types';

interface Entry {
  runtime: AgentRuntime;
  createdAt: number;
}

/**
 * Explicitly constructed owner of the process's agent runtimes and their
 * lifecycles. Lookups return the runtime; listings return plain summaries.
 */
export class AgentRegistry {
  private readonly agents = new Map<string, Entry>();

  constructor(private readonly getTime: () => number = () => Date.now()) {}

  register(runtime: AgentRuntime): void {
    if (!runtime.agentId) {
      throw new Error('Invalid agent');
    }
    if (this.agents.has(runtime.agentId)) {
      throw new Error(`Agent already registered: ${runtime.agentId}`);
    }
    this.agents.set(runtime.agentId, { runtime, createdAt: this.getTime() });
  }

  get(id: string): AgentRuntime | undefined {
    return this.agents.get(id)?.runtime;
  }

  profile(id: string): AgentProfile | undefined {
    const entry = this.agents.get(id);
    return entry ? { id, role: entry.runtime.role, createdAt: entry.createdAt } : undefined;
  }

  list(): AgentSummary[] {
    return [...this.agents.values()].map(summarize);
  }

  listByRole(role: AgentRole): AgentSummary[] {
    return [...this.agents.values()]
      .filter((entry) => entry.runtime.role === role)
      .map(summarize);
  }

  /** Stops and forgets the agent. Returns false when it was never registered. */
  async remove(id: string): Promise<boolean> {
    const entry = this.agents.get(id);
    if (!entry) {
      return false;
    }
    this.agents.delete(id);
    await entry.runtime.stop();
    return true;
  }

  async startAll(): Promise<void> {
    for (const { runtime } of this.agents.values()) {
      await runtime.start();
    }
  }

  async stopAll(): Promise<void> {
    await Promise.all([...this.agents.values()].map(({ runtime }) => runtime.stop()));
  }
}

function summarize(entry: Entry): AgentSummary {
  const { runtime, createdAt } = entry;
  return { id: runtime.agentId, role: runtime.role, createdAt, status: runtime.getStatus() };
}
