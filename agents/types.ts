import type { AgentRole, AgentStatus } from '../runtime/types';

export interface AgentProfile {
  id: string;
  role: AgentRole;
  createdAt: number;
}

export interface AgentSummary extends AgentProfile {
  status: AgentStatus;
}

/** `type:id` entry describing an agent to create at startup. */
export interface AgentSpec {
  role: AgentRole;
  id: string;
}
