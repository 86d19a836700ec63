/**
 * Supervisor Agent Registry
 *
 * Holds the supervisor descriptor and the worker pool of one workflow.
 * Populated at build time, sealed by compile(), read-only afterwards.
 */

import {
  DuplicateAgentNameError,
  RegistrySealedError,
  UnknownAgentError,
  type AgentDescriptor,
  type AgentRole,
  type AgentSpec,
} from '@switchboard/supervisor-contracts';

/**
 * Registry for the agents of a supervisor workflow
 */
export class AgentRegistry {
  private workers: Map<string, AgentDescriptor> = new Map();
  private sealed = false;
  readonly supervisor: AgentDescriptor;

  constructor(supervisor: AgentSpec) {
    this.supervisor = toDescriptor(supervisor, 'supervisor');
  }

  /**
   * Register a worker agent
   *
   * Names are case-sensitive and must not collide with another worker or with
   * the supervisor.
   */
  register(spec: AgentSpec): AgentDescriptor {
    if (this.sealed) {
      throw new RegistrySealedError(spec.name);
    }
    if (spec.name === this.supervisor.name) {
      throw new DuplicateAgentNameError(spec.name, true);
    }
    if (this.workers.has(spec.name)) {
      throw new DuplicateAgentNameError(spec.name);
    }

    const descriptor = toDescriptor(spec, 'worker');
    this.workers.set(descriptor.name, descriptor);
    return descriptor;
  }

  /**
   * Resolve an agent (supervisor or worker) by name
   */
  resolve(name: string): AgentDescriptor {
    const agent = this.get(name);
    if (!agent) {
      throw new UnknownAgentError(name);
    }
    return agent;
  }

  /**
   * Get agent by name
   */
  get(name: string): AgentDescriptor | undefined {
    if (name === this.supervisor.name) {
      return this.supervisor;
    }
    return this.workers.get(name);
  }

  /**
   * Check whether a worker with this name is registered
   */
  has(name: string): boolean {
    return this.workers.has(name);
  }

  /**
   * Get all workers in registration order
   */
  getAll(): AgentDescriptor[] {
    return Array.from(this.workers.values());
  }

  /**
   * Find workers by capability
   *
   * @returns Workers that declare ANY of the given capability ids
   */
  findByCapability(capabilities: string[]): AgentDescriptor[] {
    return this.getAll().filter((agent) =>
      capabilities.some((capability) => agent.capabilities.includes(capability)),
    );
  }

  /**
   * Format workers for a supervisor prompt
   *
   * Lists each worker's name, instruction and capabilities.
   */
  toPromptFormat(): string {
    const agents = this.getAll();

    if (agents.length === 0) {
      return 'No worker agents available. Answer the request directly.';
    }

    return agents
      .map((agent) => {
        const parts = [`**${agent.name}**`, `- ${agent.instruction}`];

        if (agent.capabilities.length > 0) {
          parts.push(`- Capabilities: ${agent.capabilities.join(', ')}`);
        }

        return parts.join('\n');
      })
      .join('\n\n---\n\n');
  }

  /**
   * Get count of registered workers
   */
  count(): number {
    return this.workers.size;
  }

  /**
   * Check if any workers are registered
   */
  hasAgents(): boolean {
    return this.workers.size > 0;
  }

  /**
   * Close the registry to further registration
   */
  seal(): void {
    this.sealed = true;
  }

  isSealed(): boolean {
    return this.sealed;
  }
}

function toDescriptor(spec: AgentSpec, role: AgentRole): AgentDescriptor {
  return Object.freeze({
    name: spec.name,
    role,
    capabilities: Object.freeze([...new Set(spec.capabilities ?? [])]),
    instruction: spec.instruction,
    step: spec.step,
  });
}
