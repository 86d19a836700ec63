import { describe, it, expect, beforeEach } from 'vitest';
import {
  DuplicateAgentNameError,
  RegistrySealedError,
  UnknownAgentError,
} from '@switchboard/supervisor-contracts';
import { AgentRegistry } from '../registry/agent-registry.js';
import { scriptedWorker } from '../testing.js';

describe('AgentRegistry', () => {
  let registry: AgentRegistry;

  beforeEach(() => {
    registry = new AgentRegistry({ name: 'supervisor', instruction: 'Route requests', step: scriptedWorker() });
  });

  describe('register', () => {
    it('should keep registration order', () => {
      registry.register({ name: 'research_expert', instruction: 'Search', step: scriptedWorker() });
      registry.register({ name: 'math_expert', instruction: 'Compute', step: scriptedWorker() });

      expect(registry.getAll().map((agent) => agent.name)).toEqual(['research_expert', 'math_expert']);
      expect(registry.count()).toBe(2);
      expect(registry.hasAgents()).toBe(true);
    });

    it('should reject a duplicate name', () => {
      registry.register({ name: 'math_expert', instruction: 'Compute', step: scriptedWorker() });

      expect(() =>
        registry.register({ name: 'math_expert', instruction: 'Other', step: scriptedWorker() }),
      ).toThrow(DuplicateAgentNameError);
    });

    it('should reject the supervisor name', () => {
      expect(() =>
        registry.register({ name: 'supervisor', instruction: 'Impostor', step: scriptedWorker() }),
      ).toThrow('Agent name "supervisor" is reserved for the supervisor');
    });

    it('should treat names as case-sensitive', () => {
      registry.register({ name: 'math_expert', instruction: 'Compute', step: scriptedWorker() });
      registry.register({ name: 'Math_Expert', instruction: 'Compute', step: scriptedWorker() });

      expect(registry.count()).toBe(2);
    });

    it('should reject registration after seal', () => {
      registry.seal();

      expect(registry.isSealed()).toBe(true);
      expect(() =>
        registry.register({ name: 'late', instruction: 'Too late', step: scriptedWorker() }),
      ).toThrow(RegistrySealedError);
    });

    it('should freeze descriptors and dedupe capabilities', () => {
      const descriptor = registry.register({
        name: 'math_expert',
        capabilities: ['add', 'multiply', 'add'],
        instruction: 'Compute',
        step: scriptedWorker(),
      });

      expect(descriptor.role).toBe('worker');
      expect(descriptor.capabilities).toEqual(['add', 'multiply']);
      expect(Object.isFrozen(descriptor)).toBe(true);
    });
  });

  describe('resolve', () => {
    it('should resolve the supervisor and workers', () => {
      registry.register({ name: 'math_expert', instruction: 'Compute', step: scriptedWorker() });

      expect(registry.resolve('supervisor').role).toBe('supervisor');
      expect(registry.resolve('math_expert').role).toBe('worker');
    });

    it('should throw for unknown names', () => {
      expect(() => registry.resolve('ghost')).toThrow(UnknownAgentError);
      expect(registry.get('ghost')).toBeUndefined();
    });

    it('should not report the supervisor as a worker', () => {
      expect(registry.has('supervisor')).toBe(false);
    });
  });

  describe('findByCapability', () => {
    beforeEach(() => {
      registry.register({ name: 'math_expert', capabilities: ['add', 'multiply'], instruction: 'Compute', step: scriptedWorker() });
      registry.register({ name: 'research_expert', capabilities: ['web_search'], instruction: 'Search', step: scriptedWorker() });
    });

    it('should match any of the capabilities', () => {
      const agents = registry.findByCapability(['multiply', 'web_search']);
      expect(agents.map((agent) => agent.name)).toEqual(['math_expert', 'research_expert']);
    });

    it('should return empty array for no matches', () => {
      expect(registry.findByCapability(['translate'])).toEqual([]);
    });
  });

  describe('toPromptFormat', () => {
    it('should list workers with their capabilities', () => {
      registry.register({ name: 'math_expert', capabilities: ['add', 'multiply'], instruction: 'Solve arithmetic', step: scriptedWorker() });
      registry.register({ name: 'writer', instruction: 'Draft prose', step: scriptedWorker() });

      expect(registry.toPromptFormat()).toBe(
        '**math_expert**\n- Solve arithmetic\n- Capabilities: add, multiply\n\n---\n\n**writer**\n- Draft prose',
      );
    });

    it('should handle an empty pool', () => {
      expect(registry.hasAgents()).toBe(false);
      expect(registry.toPromptFormat()).toBe('No worker agents available. Answer the request directly.');
    });
  });
});
