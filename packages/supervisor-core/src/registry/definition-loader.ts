/**
 * Workflow definitions from YAML.
 *
 * The file declares agents, instructions, capabilities and options; steps are
 * code and are bound by agent name from the supplied map.
 *
 * ```yaml
 * supervisor:
 *   instruction: Route each request to the right expert.
 * agents:
 *   - name: math_expert
 *     capabilities: [add, multiply]
 *     instruction: Solve arithmetic.
 * options:
 *   outputMode: full_history
 * ```
 */

import { readFile } from 'node:fs/promises';
import { load } from 'js-yaml';
import {
  WorkflowConfigError,
  WorkflowFileSchema,
  formatIssues,
  type AgentDefinition,
  type AgentSpec,
  type AgentStep,
  type WorkflowDefinition,
} from '@switchboard/supervisor-contracts';

/** Runtime-only parts of a definition that a file cannot express */
export type WorkflowDefinitionOverrides = Pick<WorkflowDefinition, 'aggregation' | 'observers' | 'logger'>;

export async function loadWorkflowDefinition(
  filePath: string,
  steps: Readonly<Record<string, AgentStep>>,
  overrides: WorkflowDefinitionOverrides = {},
): Promise<WorkflowDefinition> {
  const source = await readFile(filePath, 'utf-8');
  return parseWorkflowDefinition(source, steps, overrides, filePath);
}

/**
 * Parse YAML text into a definition.
 *
 * @throws WorkflowConfigError on malformed YAML, schema violations or a
 *   missing step binding
 */
export function parseWorkflowDefinition(
  source: string,
  steps: Readonly<Record<string, AgentStep>>,
  overrides: WorkflowDefinitionOverrides = {},
  origin = '<inline>',
): WorkflowDefinition {
  let raw: unknown;
  try {
    raw = load(source);
  } catch (error) {
    throw new WorkflowConfigError(
      `Failed to parse ${origin}: ${error instanceof Error ? error.message : String(error)}`,
    );
  }

  const parsed = WorkflowFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new WorkflowConfigError(
      `Invalid workflow file ${origin}: ${formatIssues(parsed.error.issues)}`,
      parsed.error.issues,
    );
  }

  const file = parsed.data;
  return {
    supervisor: bind(file.supervisor, steps, origin),
    agents: file.agents.map((agent) => bind(agent, steps, origin)),
    ...file.options,
    ...overrides,
  };
}

function bind(
  agent: AgentDefinition,
  steps: Readonly<Record<string, AgentStep>>,
  origin: string,
): AgentSpec {
  const step = Object.hasOwn(steps, agent.name) ? steps[agent.name] : undefined;
  if (!step) {
    throw new WorkflowConfigError(`No step bound for agent "${agent.name}" declared in ${origin}`);
  }
  return {
    name: agent.name,
    capabilities: agent.capabilities,
    instruction: agent.instruction,
    step,
  };
}
