import { AgentRuntime } from '../runtime/agent-runtime';
import { variantFor } from '../runtime/prompts';
import type { AgentRole, AgentRuntimeOptions } from '../runtime/types';
import type { AgentSpec } from './types';

export const AGENT_ROLES: readonly AgentRole[] = ['research', 'synthesis', 'general'];

export type AgentDependencies = Omit<AgentRuntimeOptions, 'agentId' | 'variant'>;

export function isAgentRole(value: string): value is AgentRole {
  return AGENT_ROLES.some((role) => role === value);
}

export function createAgent(role: AgentRole, agentId: string, dependencies: AgentDependencies): AgentRuntime {
  return new AgentRuntime({ ...dependencies, agentId, variant: variantFor(role) });
}

/**
 * Parses `research:research-1,synthesis:synthesis-1`. Throws on unknown roles,
 * missing ids and duplicate ids.
 */
export function parseAgentSpecs(value: string): AgentSpec[] {
  const specs: AgentSpec[] = [];
  const seen = new Set<string>();

  for (const entry of value.split(',').map((part) => part.trim()).filter(Boolean)) {
    const [role, id, ...rest] = entry.split(':').map((part) => part.trim());
    if (!role || !id || rest.length > 0) {
      throw new Error(`Invalid agent entry "${entry}": expected type:id`);
    }
    if (!isAgentRole(role)) {
      throw new Error(`Unknown agent type "${role}". Expected one of: ${AGENT_ROLES.join(', ')}`);
    }
    if (seen.has(id)) {
      throw new Error(`Duplicate agent id "${id}"`);
    }
    seen.add(id);
    specs.push({ role, id });
  }

  return specs;
}
